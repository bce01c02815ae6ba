/**
 * @file Persistence barrel
 */
export { saveStore, loadStore, saveToFile, loadFromFile } from "./store_io";
export { encodeStore, decodeStore, toDocument, parseDocument, fromDocument } from "./serialize";
export type { StoreDocument } from "./serialize";
