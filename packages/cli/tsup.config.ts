import { defineConfig } from 'tsup';

export default defineConfig({
  entry: { greengate: 'bin/greengate.ts' },
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  clean: true,
  sourcemap: true,
  // Workspace packages ship TypeScript sources, so they go into the bundle.
  noExternal: [/^@greengate\//],
  external: ['better-sqlite3', 'commander', 'yaml', 'zod'],
});
