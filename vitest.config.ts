import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: "node",
    include: ["services/**/*.test.ts", "ui/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
    },
  },
});
