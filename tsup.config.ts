import { defineConfig } from 'tsup';
import { readFileSync } from 'node:fs';

const { version }: { version: string } = JSON.parse(readFileSync('./package.json', 'utf-8'));

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['cjs', 'esm'],
  dts: true,
  sourcemap: false,
  clean: true,
  outDir: 'dist',
  define: {
    '__YAMLGUARD_VERSION__': JSON.stringify(version),
  },
});
