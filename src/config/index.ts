/**
 * @file Shared config API surface for the server and library callers.
 */
import path from "node:path";
import type { IVFStoreClient } from "../client/types";
import { createClientFromConfig, type ClientDeps } from "../client/from_config";
import type { AppConfig } from "./types";
import { CONFIG_EXTS, DEFAULT_CONFIG_STEM } from "./resolve";
import { loadConfigModule } from "./loader";
import { normalizeConfig } from "./normalize";

export { resolveConfigPath, CONFIG_EXTS, DEFAULT_CONFIG_STEM } from "./resolve";
export { loadConfigModule, type LoadedConfig } from "./loader";
export { normalizeConfig, defineConfig, type RawAppConfig, type NormalizeOptions } from "./normalize";
export type { AppConfig, ServerOptions, CorsOptions, EmbeddingsConfig, IndexConfig, DatabaseOptions } from "./types";

/** Load + normalize a config; relative paths resolve against the config file's directory. */
export async function loadAppConfig(pathToConfig?: string): Promise<AppConfig> {
  const loaded = await loadConfigModule(pathToConfig);
  return normalizeConfig(loaded.raw, { baseDir: path.dirname(loaded.path) });
}

/** Load + normalize + open a client from a config path. */
export async function openClientFromConfig(pathToConfig?: string, deps?: ClientDeps): Promise<IVFStoreClient<unknown>> {
  const cfg = await loadAppConfig(pathToConfig);
  return createClientFromConfig(cfg, deps);
}

/** A short label like `ivfstore.config[mjs/mts/ts/cjs/js/json]` for help output. */
export function configPatternsLabel(): string {
  return `${DEFAULT_CONFIG_STEM}[${CONFIG_EXTS.map((e) => e.slice(1)).join("/")}]`;
}
