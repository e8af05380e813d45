import { defineConfig } from "vitest/config";

// tree-sitter patches its native prototypes once per process; a module graph
// loaded twice in one process sees the patched getter. One process per test file.
export default defineConfig({
  test: {
    globals: true,
    include: ["tests/**/*.test.ts"],
    pool: "forks",
    isolate: true,
    poolOptions: {
      forks: { isolate: true },
    },
  },
});
