import { defineConfig } from 'tsup';
import { readFileSync } from 'fs';
import { join } from 'path';

const packageJson = JSON.parse(
  readFileSync(join(process.cwd(), 'package.json'), 'utf-8'),
) as {
  dependencies?: Record<string, string>;
  peerDependencies?: Record<string, string>;
  devDependencies?: Record<string, string>;
};

// Everything declared in package.json stays external, consumers install their own deps
const getAllDependencies = (): string[] => {
  const deps = new Set<string>();

  for (const group of [
    packageJson.dependencies,
    packageJson.peerDependencies,
    packageJson.devDependencies,
  ]) {
    if (group) {
      for (const dep of Object.keys(group)) {
        deps.add(dep);
      }
    }
  }

  return Array.from(deps).sort();
};

export default defineConfig({
  entry: ['src/index.ts'],
  outDir: 'dist',
  format: ['cjs', 'esm'],
  dts: true,
  splitting: false,
  sourcemap: true,
  clean: true,
  external: getAllDependencies(),
});
