import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include    : ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
        environment: "node",
        server     : {
            deps: {
                // Load plain .mjs modules (user emitters) through Node's native import
                external: [/\.mjs$/],
            },
        },
    },
});
