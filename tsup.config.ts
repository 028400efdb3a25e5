import { defineConfig } from 'tsup'

/**
 * Library build: one entry, CommonJS + ESM bundles with declarations.
 * Nothing in the tree depends on Node.js built-ins, so the output is
 * platform-neutral.
 */
export default defineConfig({
    name: 'numerix',

    entry: {
        index: 'index.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: false,
    minify: false,
    treeshake: true,

    sourcemap: true,
    clean: true,

    outDir: 'dist',
    target: 'es2020',
    platform: 'neutral',
})
