import { fileURLToPath } from "node:url";
import { config } from "dotenv";
import { defineConfig } from "vitest/config";

// Load .env.test for test isolation
config({ path: fileURLToPath(new URL(".env.test", import.meta.url)) });

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/src/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist"],
  },
});
