/**
 * Vitest Workspace Configuration
 *
 * Workspace Projects:
 * - core: flint-lang package tests
 * - cli: flint-lang-cli package tests
 *
 * Both projects resolve `flint-lang` to the core sources, so tests need no
 * build first.
 *
 * Run specific projects:
 *   npx vitest --project=core
 *   npx vitest --project=cli
 */
import { fileURLToPath } from 'node:url';
import { defineWorkspace } from 'vitest/config';

const alias = {
  'flint-lang': fileURLToPath(
    new URL('./packages/core/src/index.ts', import.meta.url)
  ),
};

export default defineWorkspace([
  // Core package (flint-lang)
  {
    resolve: { alias },
    test: {
      name: 'core',
      globals: false,
      environment: 'node',
      include: ['packages/core/tests/**/*.test.ts'],
    },
  },
  // CLI package (flint-lang-cli)
  {
    resolve: { alias },
    test: {
      name: 'cli',
      globals: false,
      environment: 'node',
      include: ['packages/cli/tests/**/*.test.ts'],
    },
  },
]);
