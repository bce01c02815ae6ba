/**
 * @file In-memory FileIO implementation
 */
import type { FileIO } from "./types";
import { toUint8 } from "./types";

/** In-memory FileIO. Missing paths reject with code ENOENT, as the Node backend does. */
export function createMemoryFileIO(initial?: Record<string, Uint8Array | ArrayBuffer>): FileIO {
  const files = new Map<string, Uint8Array>();
  if (initial) {
    for (const [k, v] of Object.entries(initial)) {
      files.set(k, toUint8(v));
    }
  }

  return {
    async read(path: string): Promise<Uint8Array> {
      const v = files.get(path);
      if (!v) {
        throw Object.assign(new Error(`file not found: ${path}`), { code: "ENOENT" });
      }
      return new Uint8Array(v);
    },
    async atomicWrite(path: string, data: Uint8Array | ArrayBuffer): Promise<void> {
      files.set(path, new Uint8Array(toUint8(data)));
    },
  };
}
