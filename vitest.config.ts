import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const moduleDirname = dirname(fileURLToPath(import.meta.url));
const src = (dir: string) => resolve(moduleDirname, "src", dir);

export default defineConfig({
  resolve: {
    alias: {
      "@config": src("config"),
      "@domain": src("domain"),
      "@app": src("app"),
      "@infrastructure": src("infrastructure"),
      "@interfaces": src("interfaces"),
      "@middleware": src("middleware"),
      "@routes": src("routes"),
    },
  },
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
