/**
 * @file Client barrel
 */
export type { IVFStoreClient, ClientOptions, PersistTarget } from "./types";
export { createClient, openStore } from "./create";
export { createClientFromConfig, DEFAULT_API_KEY_ENV, type ClientDeps } from "./from_config";
