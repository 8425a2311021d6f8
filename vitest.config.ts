import { defineConfig } from "vitest/config"
import { fileURLToPath } from "url"

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    setupFiles: ["./test/setup.ts"],
    include: ["**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    // PGlite is shared per worker; keep files sequential
    fileParallelism: false,
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      exclude: [
        "node_modules",
        "test/**",
        "agents/testing/**",
        "db/schema/index.ts", // Re-export barrel file
        "db/schema/contracts.ts", // Table definitions (not business logic)
      ],
    },
  },
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./", import.meta.url)),
    },
  },
})
