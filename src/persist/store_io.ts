/**
 * @file Whole-store persistence over a FileIO
 *
 * save() overwrites the target in full (temp file + rename on Node); there
 * is no append path and no partial recovery on load.
 */
import { basename, dirname, resolve } from "node:path";
import type { CoreStore } from "../core/store";
import type { FileIO } from "../storage/types";
import { createNodeFileIO } from "../storage/node";
import { decodeStore, encodeStore } from "./serialize";

/**
 *
 */
export async function saveStore<T>(s: CoreStore<T>, io: FileIO, path: string): Promise<void> {
  await io.atomicWrite(path, encodeStore(s));
}

/** Read errors from the FileIO propagate unchanged; malformed content raises CorruptDataError. */
export async function loadStore(io: FileIO, path: string): Promise<CoreStore<unknown>> {
  const bytes = await io.read(path);
  return decodeStore(bytes);
}

/** Save to a file system path using the Node FileIO. */
export async function saveToFile<T>(s: CoreStore<T>, path: string): Promise<void> {
  const full = resolve(path);
  await saveStore(s, createNodeFileIO(dirname(full)), basename(full));
}

/** Load from a file system path using the Node FileIO. */
export async function loadFromFile(path: string): Promise<CoreStore<unknown>> {
  const full = resolve(path);
  return loadStore(createNodeFileIO(dirname(full)), basename(full));
}
