/**
 * @file Hono app assembly
 */
import { Hono } from "hono";
import type { AppConfig } from "../config/types";
import type { IVFStoreClient } from "../client/types";
import type { RouteContext } from "./routes/context";
import { applyCors } from "./cors";
import { redactConfig } from "./utils";
import { httpError, statusOf } from "./common/errors";
import { getById } from "./routes/vectors/get_by_id";
import { deleteById } from "./routes/vectors/delete_by_id";
import { postCreate } from "./routes/vectors/post_create";
import { postBulk } from "./routes/vectors/post_bulk";
import { search as searchVectors } from "./routes/vectors/search";
import { postBuild } from "./routes/index_build";

/** Build and return a Hono app exposing REST endpoints over the client. */
export function createApp(client: IVFStoreClient<unknown>, cfg: AppConfig = {}) {
  const app = new Hono();

  app.onError((err) => {
    const status = statusOf(err);
    return new Response(JSON.stringify({ error: { message: err.message } }), {
      status,
      headers: { "content-type": "application/json" },
    });
  });
  app.notFound((c) => c.json({ error: { message: "Not Found" } }, 404));

  applyCors(app, cfg.server?.cors);

  app.get("/health", (c) => c.json({ ok: true }));
  app.get("/stats", (c) =>
    c.json({
      size: client.size,
      dim: client.dim,
      metric: client.index.metric,
      index: client.stats(),
    }),
  );
  app.get("/config", (c) => c.json(redactConfig(cfg)));

  const ctx: RouteContext = { client };
  app.get("/vectors/:id", (c) => getById(c, ctx));
  app.delete("/vectors/:id", (c) => deleteById(c, ctx));
  app.post("/vectors", (c) => postCreate(c, ctx));
  app.post("/vectors/bulk", (c) => postBulk(c, ctx));
  app.post("/vectors/search", (c) => searchVectors(c, ctx));
  app.post("/index/build", (c) => postBuild(c, ctx));

  app.post("/save", async (c) => {
    if (!client.canSave) {
      throw httpError(400, "no store path configured");
    }
    await client.save();
    return c.json({ ok: true });
  });

  return app;
}
