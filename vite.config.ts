import { defineConfig } from "vite";
import { URL, fileURLToPath } from "node:url";

const resolveFromRoot = (relativePath: string) =>
    fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
    appType: "spa",
    build: {
        outDir: "dist",
        sourcemap: true
    },
    resolve: {
        alias: {
            "app": resolveFromRoot("./src/app"),
            "cli": resolveFromRoot("./src/cli"),
            "config": resolveFromRoot("./src/config"),
            "game": resolveFromRoot("./src/game"),
            "input": resolveFromRoot("./src/input"),
            "physics": resolveFromRoot("./src/physics"),
            "render": resolveFromRoot("./src/render"),
            "scenes": resolveFromRoot("./src/scenes"),
            "types": resolveFromRoot("./src/types"),
            "util": resolveFromRoot("./src/util")
        }
    },
    server: {
        port: 5173,
        strictPort: true
    }
});
