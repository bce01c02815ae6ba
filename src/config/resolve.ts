/**
 * @file Config path resolution
 */
import path from "node:path";
import { access } from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import { hasErrorCode } from "../util/guards";

/** Supported config extensions (resolution order). */
export const CONFIG_EXTS = [".mjs", ".mts", ".ts", ".cjs", ".js", ".json"] as const;
/** Default, extensionless config file stem used across the project. */
export const DEFAULT_CONFIG_STEM = "ivfstore.config" as const;

async function exists(p: string): Promise<boolean> {
  try {
    await access(p, fsConstants.F_OK);
    return true;
  } catch (e) {
    if (hasErrorCode(e) && (e.code === "ENOENT" || e.code === "ENOTDIR")) {
      return false;
    }
    throw e;
  }
}

/** Resolve a config path: allow directory, bare name, or explicit file. */
export async function resolveConfigPath(input?: string): Promise<string | null> {
  const base = input ? path.resolve(input) : path.resolve(DEFAULT_CONFIG_STEM);
  if (path.extname(base) && (await exists(base))) {
    return base;
  }
  for (const ext of CONFIG_EXTS) {
    const cand = `${base}${ext}`;
    if (await exists(cand)) {
      return cand;
    }
  }
  for (const ext of CONFIG_EXTS) {
    const cand = path.join(base, `${DEFAULT_CONFIG_STEM}${ext}`);
    if (await exists(cand)) {
      return cand;
    }
  }
  return null;
}
