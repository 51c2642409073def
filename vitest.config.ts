import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 10000, // 10 second default for tests
    hookTimeout: 10000,
    include: ['tests/**/*.test.ts'],
    // Keep tests away from any real store, audit log or checkpoint file
    env: {
      NODE_ENV: 'test',
      DEDUP_STORE_PATH: ':memory:',
      DEDUP_AUDIT_LOG: '',
      DEDUP_CHECKPOINT_PATH: '',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        // Entry points are thin wrappers over the services tested directly
        'src/cli/**',
        'src/cli.ts',
        'src/index.ts',
        '**/types.ts',
      ],
    },
  },
});
