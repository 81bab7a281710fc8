import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["zwave-cli/**/*.test.ts"],
    environment: "node",
  },
});
