import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    testTimeout: 10000,
    expect: {
      poll: { interval: 1 },
    },
    include: ["src/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
    },
  },
})
