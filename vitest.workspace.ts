import { defineWorkspace } from "vitest/config";

export default defineWorkspace([
  "packages/types",
  "packages/sse-events",
  "packages/testing",
]);
