import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    cli: 'src/cli/index.ts',
    index: 'src/index.ts',
  },
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  bundle: true,
  external: ['fastify', 'commander', 'debug', 'yaml'],
  sourcemap: true,
  dts: true,
  clean: true,
  splitting: true,
  treeshake: true,
});
