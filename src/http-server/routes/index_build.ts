/**
 * @file POST /index/build handler
 */
import type { Context } from "hono";
import type { RouteContext } from "./context";

/** Rebuild the partition from the current store contents and return its stats. */
export async function postBuild(c: Context, { client }: RouteContext) {
  return c.json(client.build());
}
