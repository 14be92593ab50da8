import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["test/**/*.test.ts"],
        environment: "node",
        // Loading the azure-native SDK dominates the first pipeline test.
        testTimeout: 30000,
    },
});
