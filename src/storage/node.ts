/**
 * @file Node.js file system storage adapter
 */
import { readFile, rename, mkdir, rm, open } from "node:fs/promises";
import { dirname, join as joinPath } from "node:path";
import type { FileIO } from "./types";
import { toUint8 } from "./types";
import { hasErrorCode } from "../util/guards";

function isRetryableError(error: unknown): boolean {
  if (!hasErrorCode(error)) {
    return false;
  }
  return error.code === "EBUSY" || error.code === "EMFILE" || error.code === "ENFILE";
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function retryOperation<T>(operation: () => Promise<T>, maxRetries: number = 3, baseDelay: number = 100): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= maxRetries || !isRetryableError(error)) {
        throw error;
      }
      // Exponential backoff with jitter
      const delay = baseDelay * Math.pow(2, attempt) + Math.random() * 50;
      await sleep(delay);
    }
  }
}

async function writeSynced(path: string, data: Uint8Array | ArrayBuffer): Promise<void> {
  const fd = await open(path, "w");
  try {
    await fd.writeFile(toUint8(data));
    await fd.sync();
  } finally {
    await fd.close();
  }
}

/** Prefixed Node FileIO. Why: keep all artifacts under a base directory. */
export function createNodeFileIO(baseDir: string): FileIO {
  async function ensureDir(p: string) {
    await mkdir(dirname(p), { recursive: true });
  }
  return {
    async read(path: string) {
      const full = joinPath(baseDir, path);
      const u8 = await readFile(full);
      const out = new Uint8Array(u8.byteLength);
      out.set(u8);
      return out;
    },
    async atomicWrite(path: string, data) {
      const full = joinPath(baseDir, path);
      await ensureDir(full);
      const tmp = `${full}.tmp`;
      try {
        await writeSynced(tmp, data);
        await retryOperation(() => rename(tmp, full));
      } catch (error) {
        await rm(tmp, { force: true });
        throw error;
      }
    },
  };
}
