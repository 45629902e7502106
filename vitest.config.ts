import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

const packageEntry = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@subfilter/core": packageEntry("core"),
      "@subfilter/scripting": packageEntry("scripting"),
      "@subfilter/models": packageEntry("models"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
  },
});
