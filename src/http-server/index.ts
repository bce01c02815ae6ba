/**
 * @file Public HTTP server entry (barrel)
 */
export { createApp } from "./app";
export { startServerFromFile, DEFAULT_PORT, DEFAULT_HOST } from "./start";
export { httpError, statusOf } from "./common/errors";
export { redactConfig } from "./utils";
