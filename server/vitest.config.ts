import path from "node:path";
import { defineConfig } from "vitest/config";

const testDbPath = path.resolve(__dirname, "../db/test-db.json");

if (!process.env.DB_FILE_PATH) {
  process.env.DB_FILE_PATH = testDbPath;
}

export default defineConfig({
  test: {
    environment: "node",
    globals: true,
    setupFiles: ["tests/setup.ts"],
    include: ["tests/**/*.test.ts"],
    fileParallelism: false,
    sequence: {
      concurrent: false
    },
    // keep a local .env from changing the analytics defaults under test
    env: {
      NODE_ENV: "test",
      ANALYTICS_CONFIG_FILE: "",
      HEALTH_WEIGHTS: "",
      TREND_TOLERANCE: "",
      BUDGET_SATURATION: "",
      NO_DATA_POLICY: ""
    }
  }
});
