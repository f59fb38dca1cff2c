import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    globals: false,
    dir: path.resolve(process.cwd()),
    setupFiles: [path.resolve(process.cwd(), 'tests/setup.ts')],
    // Read by src/config.ts at import time, before any setup file runs
    env: {
      LOG_CONSOLE: '0',
      LOG_FILE: '',
      LOG_LEVEL: 'info',
      GIT_SSH_KEY_PATH: '',
    },
  },
});
