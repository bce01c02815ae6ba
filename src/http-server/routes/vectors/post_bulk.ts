/**
 * @file POST /vectors/bulk handler
 * Inserts every row in order, then rebuilds the index.
 */
import type { Context } from "hono";
import type { RouteContext } from "../context";
import { readJson } from "../../common/params";
import { parseBulkBody } from "../../utils";

/** Handle POST /vectors/bulk. */
export async function postBulk(c: Context, { client }: RouteContext) {
  const rows = parseBulkBody(await readJson(c));
  if (!rows) {
    return c.json({ error: { message: "rows:{ vector:number[], meta? }[] required" } }, 400);
  }
  const ids = client.addBulk(
    rows.map((r) => r.vector),
    rows.map((r) => r.meta),
  );
  return c.json({ ids });
}
