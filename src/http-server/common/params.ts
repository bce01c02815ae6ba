/**
 * @file Common request param helpers
 */
import type { Context } from "hono";
import { httpError } from "./errors";

/**
 *
 */
export function ensureNumericId(c: Context, name: string = "id"): number {
  const raw = c.req.param(name);
  if (raw === undefined || !/^(0|[1-9][0-9]*)$/.test(raw)) {
    throw httpError(400, "Invalid id");
  }
  return Number(raw);
}

/** Parse the request body as JSON; malformed bodies become 400s. */
export async function readJson(c: Context): Promise<unknown> {
  try {
    const body: unknown = await c.req.json();
    return body;
  } catch {
    throw httpError(400, "invalid JSON body");
  }
}
