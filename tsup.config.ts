import { defineConfig } from 'tsup';

export default defineConfig({
    entry: ['src/cli/index.ts'],
    format: ['esm'],
    target: 'node20',
    outDir: 'dist/bundle',
    clean: true,
    splitting: false,
    sourcemap: false,
    dts: false,
    // The CLI entry already carries its shebang line.
    // better-sqlite3 is a native addon and cannot be bundled.
    external: ['better-sqlite3'],
});
