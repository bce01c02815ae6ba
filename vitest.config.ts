/**
 * @file Vitest testing framework configuration
 *
 * Runs colocated `*.spec.ts` files under src/ and end-to-end specs under
 * spec/ in a Node.js environment with global test APIs.
 */

import { defineConfig } from "vitest/config";
export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.spec.ts", "spec/**/*.spec.ts"],
    setupFiles: [],
  },
});
