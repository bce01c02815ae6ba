/**
 * @file POST /vectors/search handler
 * KNN search by vector, or by text when an embeddings provider is configured.
 */
import type { Context } from "hono";
import type { RouteContext } from "../context";
import { readJson } from "../../common/params";
import { httpError } from "../../common/errors";
import { parseSearchBody } from "../../utils";

/** Handle POST /vectors/search. */
export async function search(c: Context, { client }: RouteContext) {
  const body = parseSearchBody(await readJson(c));
  if ("vector" in body) {
    return c.json({ hits: client.search(body.vector, body.k) });
  }
  if (!client.canEmbed) {
    throw httpError(400, "text search requires server.embeddings with an API key");
  }
  return c.json({ hits: await client.searchText(body.text, body.k) });
}
