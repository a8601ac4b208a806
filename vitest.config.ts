import path from "node:path";
import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

// Subpaths must come before their parent packages
const aliases = [
  {
    find: "@taskloop/agent-runtime-telemetry/logging",
    replacement: path.resolve(rootDir, "packages/agent-runtime-telemetry/src/logging/index.ts"),
  },
  {
    find: "@taskloop/agent-runtime-telemetry",
    replacement: path.resolve(rootDir, "packages/agent-runtime-telemetry/src/index.ts"),
  },
  {
    find: "@taskloop/agent-runtime-core",
    replacement: path.resolve(rootDir, "packages/agent-runtime-core/src/index.ts"),
  },
  {
    find: "@taskloop/agent-runtime-tools",
    replacement: path.resolve(rootDir, "packages/agent-runtime-tools/src/index.ts"),
  },
  {
    find: "@taskloop/agent-runtime",
    replacement: path.resolve(rootDir, "packages/agent-runtime/src/index.ts"),
  },
  {
    find: "@taskloop/ai-core",
    replacement: path.resolve(rootDir, "packages/ai-core/src/index.ts"),
  },
];

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    env: {
      LOG_LEVEL: "silent",
    },
    testTimeout: 20_000,
  },
});
