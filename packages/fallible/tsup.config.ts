import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Main entry point (Fallible namespace + named exports)
    index: 'src/index.ts',

    // =========================================================================
    // Functional programming utilities
    // =========================================================================
    functional: 'src/functional-entry.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
});
