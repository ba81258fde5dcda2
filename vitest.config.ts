import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        globals: true,
        environment: "node",
        include: ["tests/**/*.test.ts"],
        // Tests share the process-wide logger and env vars
        fileParallelism: false,
        sequence: {
            concurrent: false,
        },
    },
});
