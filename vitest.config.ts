import path from "node:path";
import { fileURLToPath } from "node:url";

import { defineConfig, defineProject } from "vitest/config";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

const defaultExclude = ["**/node_modules/**", "**/dist/**", "**/coverage/**"];

// Point each workspace package at its TypeScript sources so tests never need a build
const aliases = [
  { find: "@textmark/core", replacement: path.resolve(rootDir, "packages/core/src/index.ts") },
  {
    find: "@textmark/schema",
    replacement: path.resolve(rootDir, "packages/schema/src/index.ts"),
  },
];

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    environment: "node",
    exclude: defaultExclude,
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json"],
      reportsDirectory: "coverage",
    },
    projects: [
      defineProject({
        resolve: {
          alias: aliases,
        },
        test: {
          name: "core",
          include: ["packages/core/src/**/__tests__/**/*.test.ts"],
          exclude: defaultExclude,
          environment: "node",
        },
      }),
      defineProject({
        resolve: {
          alias: aliases,
        },
        test: {
          name: "schema",
          include: ["packages/schema/src/**/__tests__/**/*.test.ts"],
          exclude: defaultExclude,
          environment: "node",
        },
      }),
    ],
  },
});
