/**
 * @file Route handler context shared across modules
 */
import type { IVFStoreClient } from "../../client/types";

export type RouteContext = {
  client: IVFStoreClient<unknown>;
};
