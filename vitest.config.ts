import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

/**
 * hostbench - Vitest configuration
 *
 * Every test runs in process: external tools are replaced by a fake
 * CommandExecutor fed from fixture files, and artifacts go to temp dirs.
 */

// Unix-like systems use forks for better isolation
const pool = process.platform === 'win32' ? 'threads' : 'forks';

const isCI = process.env.CI === 'true';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    environment: 'node',
    pool,

    // Test files pattern - includes all packages in the workspace
    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    // No retries - surface issues immediately
    retry: 0,
    fileParallelism: !isCI,

    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,
    teardownTimeout: 5000,

    reporters: ['default'],
    silent: false,

    env: {
      NODE_ENV: 'test',
      NO_COLOR: '1',
    },
  },
});
