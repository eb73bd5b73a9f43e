import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        globals: false,
        pool: "threads",
        testTimeout: 10_000
    }
});
