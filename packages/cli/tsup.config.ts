import { defineConfig } from 'tsup';
import { readFileSync } from 'fs';

const pkg: { version: string } = JSON.parse(readFileSync('./package.json', 'utf-8'));
const isProduction = process.env['NODE_ENV'] === 'production';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  sourcemap: !isProduction,
  clean: true,
  splitting: false,
  treeshake: true,
  outDir: 'dist',
  target: 'node20',
  minify: isProduction,
  // The catalog workspace exports TypeScript sources; bundle it
  noExternal: ['@cudarch/catalog'],
  define: {
    'process.env.CUDARCH_VERSION': JSON.stringify(pkg.version),
  },
});
