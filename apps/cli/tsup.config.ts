import { defineConfig } from 'tsup';

export default defineConfig({
  entry: { main: 'src/main.ts' },
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  dts: false,
  clean: true,
  sourcemap: true,
  noExternal: ['@pagescribe/converter', '@pagescribe/logger', '@pagescribe/shared'],
});
