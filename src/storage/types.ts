/**
 * @file File I/O abstraction layer
 * Why: keep store persistence independent of the byte backend (Node file
 * system, in-memory for tests).
 */
export type FileIO = {
  read(path: string): Promise<Uint8Array>;
  /** Replace the whole file at once: temp file + rename where the backend allows it. */
  atomicWrite(path: string, data: Uint8Array | ArrayBuffer): Promise<void>;
};

/** Convert ArrayBuffer to Uint8Array (no-copy when possible). */
export function toUint8(data: Uint8Array | ArrayBuffer): Uint8Array {
  return data instanceof Uint8Array ? data : new Uint8Array(data);
}
