import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const packagesDir = fileURLToPath(new URL('./packages/', import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages run from source; their package exports point at dist/
    alias: [
      {
        find: /^@hostwarden\/utils\/(logger|errors)$/,
        replacement: `${packagesDir}utils/src/$1.ts`,
      },
      {
        find: /^@hostwarden\/(utils|config|resiliency|daemon)$/,
        replacement: `${packagesDir}$1/src/index.ts`,
      },
    ],
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts', 'packages/**/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts', 'packages/**/src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/__fixtures__/**'],
    },
  },
});
