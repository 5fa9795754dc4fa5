import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/events/index.ts', 'src/registry/index.ts', 'src/examples/index.ts'],
  format: ['esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  target: 'es2022',
  outDir: 'dist',
  splitting: false,
  treeshake: true,
  external: ['pino', 'pino-pretty', 'eventemitter3'],
});
