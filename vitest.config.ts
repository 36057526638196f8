import { mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { defineConfig } from 'vitest/config';

// Ensure a stable, writable temp directory for vitest internals.
const resolvedTmpDir =
  process.env.TMPDIR && process.env.TMPDIR.trim().length > 0
    ? process.env.TMPDIR
    : tmpdir();
process.env.TMPDIR = resolvedTmpDir;
try {
  mkdirSync(resolvedTmpDir, { recursive: true });
} catch {
  // If we cannot create it, let vitest surface the error normally.
}

/**
 * Vitest configuration for triage-runtime.
 *
 * Worker count can be pinned with TRIAGE_TEST_WORKERS; pipeline logs are
 * silenced by vitest.setup.ts unless TRIAGE_TEST_VERBOSE=true.
 */
const envWorkers = parseInt(process.env.TRIAGE_TEST_WORKERS ?? '', 10);
const maxForks = !isNaN(envWorkers) && envWorkers > 0 ? envWorkers : 2;

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks,
        minForks: 1,
      },
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        'vitest.config.ts',
        'vitest.setup.ts',
      ],
    },
  },
});
