import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";
import path from "node:path";

const dir = fileURLToPath(new URL("./", import.meta.url));

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
    setupFiles: [path.join(dir, "tests/setup.ts")],
    environment: "node",
  },
});
