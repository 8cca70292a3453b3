import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import path from 'node:path';

const resolveFromRoot = (relativePath: string): string => {
    const rootDir = path.dirname(fileURLToPath(import.meta.url));
    return path.resolve(rootDir, relativePath);
};

export default defineConfig({
    resolve: {
        alias: {
            'app': resolveFromRoot('src/app'),
            'cli': resolveFromRoot('src/cli'),
            'config': resolveFromRoot('src/config'),
            'game': resolveFromRoot('src/game'),
            'input': resolveFromRoot('src/input'),
            'physics': resolveFromRoot('src/physics'),
            'render': resolveFromRoot('src/render'),
            'scenes': resolveFromRoot('src/scenes'),
            'types': resolveFromRoot('src/types'),
            'util': resolveFromRoot('src/util'),
        },
    },
    test: {
        environment: 'jsdom',
        include: ['tests/unit/**/*.spec.ts'],
        clearMocks: true,
        restoreMocks: true,
    },
});
