/**
 * @file Server boot from a config file
 */
import { serve } from "@hono/node-server";
import { loadAppConfig } from "../config";
import { createClientFromConfig, type ClientDeps } from "../client/from_config";
import { createApp } from "./app";

export const DEFAULT_PORT = 8787;
export const DEFAULT_HOST = "0.0.0.0";

/** Start the Hono server from a config path (default: ./ivfstore.config.*). */
export async function startServerFromFile(configPath?: string, deps?: ClientDeps) {
  const cfg = await loadAppConfig(configPath);
  const client = await createClientFromConfig(cfg, deps);
  const app = createApp(client, cfg);
  const port = cfg.server?.port ?? DEFAULT_PORT;
  const host = cfg.server?.host ?? DEFAULT_HOST;
  const server = serve({ fetch: app.fetch, port, hostname: host });
  console.log(`${cfg.name ?? "ivfstore"} listening on http://${host}:${port} (${client.size} vector(s), dim ${client.dim})`);
  return { app, client, server, port, host };
}
