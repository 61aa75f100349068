import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/bin.ts', 'src/index.ts'],
  format: ['esm'],
  dts: false,
  sourcemap: true,
  clean: true,
  splitting: false,  // one file per entry so the bin runs on its own
  noExternal: ['@ppactl/contracts', '@ppactl/core'],
  external: ['zod', 'minimatch'],
});
