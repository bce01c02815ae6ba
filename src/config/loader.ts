/**
 * @file Config module loader (ESM/CJS/TS/JSON)
 */
import path from "node:path";
import { readFile } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import { createRequire } from "node:module";
import { resolveConfigPath, CONFIG_EXTS, DEFAULT_CONFIG_STEM } from "./resolve";
import { errorMessage, hasOwn } from "../util/guards";

export type LoadedConfig = { path: string; raw: unknown };

function defaultExport(mod: unknown): unknown {
  return hasOwn(mod, "default") ? mod.default : mod;
}

/** Load a config module and return its default export (or module itself) with the resolved path. */
export async function loadConfigModule(configPath?: string): Promise<LoadedConfig> {
  const resolved = await resolveConfigPath(configPath);
  if (!resolved) {
    throw new Error(
      `Config not found. Looked for ${configPath ?? DEFAULT_CONFIG_STEM + ".*"} with extensions ${CONFIG_EXTS.join(", ")}`,
    );
  }
  const ext = path.extname(resolved).toLowerCase();
  if (ext === ".json") {
    const text = await readFile(resolved, "utf8");
    try {
      return { path: resolved, raw: JSON.parse(text) };
    } catch (e) {
      throw new Error(`Failed to parse JSON config '${path.basename(resolved)}': ${errorMessage(e)}`, { cause: e });
    }
  }
  if (ext === ".cjs") {
    const req = createRequire(import.meta.url);
    return { path: resolved, raw: defaultExport(req(resolved)) };
  }
  try {
    // eslint-disable-next-line no-restricted-syntax -- dynamic import is required to load user config modules
    const mod: unknown = await import(pathToFileURL(resolved).href);
    return { path: resolved, raw: defaultExport(mod) };
  } catch (e) {
    if (ext === ".ts" || ext === ".mts") {
      throw new Error(
        `Failed to load TypeScript config '${path.basename(resolved)}'. ` +
          `Run under a TS loader (e.g., tsx) or pre-compile to .mjs/.js. Original: ${errorMessage(e)}`,
        { cause: e },
      );
    }
    throw e;
  }
}
