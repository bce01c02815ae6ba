/**
 * @file GET /vectors/:id handler
 * Returns a single vector record by id, or 404 if absent.
 */
import type { Context } from "hono";
import type { RouteContext } from "../context";
import { ensureNumericId } from "../../common/params";

/**
 * Handle GET /vectors/:id.
 * @param c - Hono context
 * @param client - Route context
 */
export async function getById(c: Context, { client }: RouteContext) {
  const id = ensureNumericId(c, "id");
  if (!client.has(id)) {
    return c.json({ error: { message: "Not found" } }, 404);
  }
  const rec = client.get(id);
  return c.json({ id, vector: rec.vector, meta: rec.meta });
}
