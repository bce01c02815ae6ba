/**
 * @file CORS mounting
 */
import type { Hono } from "hono";
import { cors as honoCors } from "hono/cors";
import type { CorsOptions } from "../config/types";

/**
 * Mount CORS middleware according to config. Pass `true` to allow all,
 * or an options object for fine-grained control. Omit to disable.
 */
export function applyCors(app: Hono, cors?: CorsOptions) {
  if (!cors) {
    return;
  } // disabled
  if (cors === true) {
    app.use("*", honoCors());
    return;
  }
  // Unset keys fall back to hono defaults.
  const opts: NonNullable<Parameters<typeof honoCors>[0]> = { origin: cors.origin ?? "*" };
  if (cors.allowMethods) {
    opts.allowMethods = cors.allowMethods;
  }
  if (cors.allowHeaders) {
    opts.allowHeaders = cors.allowHeaders;
  }
  if (cors.exposeHeaders) {
    opts.exposeHeaders = cors.exposeHeaders;
  }
  if (cors.maxAge !== undefined) {
    opts.maxAge = cors.maxAge;
  }
  if (cors.credentials !== undefined) {
    opts.credentials = cors.credentials;
  }
  app.use("*", honoCors(opts));
}
