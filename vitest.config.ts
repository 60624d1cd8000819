import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
    resolve: {
        // Workspace packages resolve to their TypeScript sources so tests need no build
        alias: {
            "@tunnelkeeper/shared": fromRoot("./packages/shared/src/index.ts"),
            "@tunnelkeeper/host": fromRoot("./packages/host/src/index.ts"),
        },
    },
    test: {
        include: ["packages/*/tests/**/*.test.ts"],
        environment: "node",
    },
});
