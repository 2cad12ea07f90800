import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/cli.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
  dts: true,
  sourcemap: true,
  splitting: true,
  treeshake: true,
  external: ['chalk', 'commander', 'gradient-string', 'inquirer', 'ora', 'simple-git', 'ts-pattern', 'zod'],
});
