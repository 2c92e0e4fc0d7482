import { defineConfig } from 'tsup';

export default defineConfig({
  clean: true,
  dts: true,
  entryPoints: ['src/index.ts'],
  external: ['@types/node', 'fastify', 'fastify-plugin', 'handlebars', 'picocolors', 'node:fs', 'node:path', 'node:url'],
  format: ['esm'],
  outDir: 'dist',
  platform: 'node',
  shims: false,
  splitting: false,
  target: 'node20',
});
