import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: "easy-wallet",
          include: ["packages/easy-wallet/test/**/*.test.ts"],
          environment: "node"
        }
      }
    ]
  }
})
