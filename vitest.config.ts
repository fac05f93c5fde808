import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["discord-bot/test/**/*.spec.ts"],
    setupFiles: ["discord-bot/test/setup.ts"],
    environment: "node",
    fileParallelism: false
  }
});
