/**
 * @file DELETE /vectors/:id handler
 * Deleting an absent id is not an error; `deleted` reports whether a row went away.
 */
import type { Context } from "hono";
import type { RouteContext } from "../context";
import { ensureNumericId } from "../../common/params";

/** Handle DELETE /vectors/:id. */
export async function deleteById(c: Context, { client }: RouteContext) {
  const id = ensureNumericId(c, "id");
  const deleted = client.delete(id);
  return c.json({ ok: true, deleted });
}
