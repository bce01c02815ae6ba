/**
 * @file POST /vectors handler (insert one row; the server assigns the id)
 */
import type { Context } from "hono";
import type { RouteContext } from "../context";
import { readJson } from "../../common/params";
import { parseVectorBody } from "../../utils";

/** Handle POST /vectors. */
export async function postCreate(c: Context, { client }: RouteContext) {
  const row = parseVectorBody(await readJson(c));
  if (!row) {
    return c.json({ error: { message: "vector:number[] required" } }, 400);
  }
  const id = client.add(row.vector, row.meta);
  return c.json({ id }, 201);
}
