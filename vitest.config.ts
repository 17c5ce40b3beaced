import os from 'os';
import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['shared/test/**/*.test.ts', 'services/**/test/**/*.test.ts', 'interfaces/**/test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 15000,
    env: {
      DOCHIVE_DATA_DIR: path.join(os.tmpdir(), 'dochive-test-data'),
      DOCHIVE_LOG_LEVEL: 'debug',
      NO_PROXY: '127.0.0.1,localhost',
      no_proxy: '127.0.0.1,localhost'
    }
  }
});
