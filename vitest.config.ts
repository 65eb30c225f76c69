import { defineConfig } from 'vitest/config';
import { readdirSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

// Resolve @switchboard/* to each package's src/index.ts so tests run
// against the sources with no build step.
const root = dirname(fileURLToPath(import.meta.url));
const packagesDir = resolve(root, 'packages');
const alias: Record<string, string> = {};
for (const name of readdirSync(packagesDir)) {
  alias[`@switchboard/${name}`] = resolve(packagesDir, name, 'src', 'index.ts');
}

export default defineConfig({
  resolve: { alias },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/index.ts'],
      thresholds: {
        lines: 85,
        functions: 85,
        branches: 80,
        statements: 85,
      },
    },
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
});
