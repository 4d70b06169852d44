import { defineConfig } from "tsup";

export default defineConfig({
    entry: ["src/cli.ts", "src/index.ts", "src/mcp/server.ts"],
    format: ["esm"],
    target: "node20",
    outDir: "dist",
    // Declarations for the library entry only
    dts: { entry: "src/index.ts" },
    clean: true,
});
