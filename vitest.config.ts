import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    // Argon2 at 64 MiB runs in WebAssembly; leave headroom on slow CI hosts.
    testTimeout: 30_000,
  },
});
