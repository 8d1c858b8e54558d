import os from 'os';
import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      GRAPHTK_LOG_DIR: path.join(os.tmpdir(), 'graphtoolkit-test-logs'),
    },
  },
});
