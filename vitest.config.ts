import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    projects: [
      // Unit tests - virtual clock, mocked collaborators
      {
        test: {
          name: 'unit',
          include: ['src/**/*.{test,spec}.ts'],
          exclude: ['src/**/*.integration.{test,spec}.ts', 'node_modules', 'dist'],
          environment: 'node',
          globals: true,
          env: {
            LOG_LEVEL: 'silent',
          },
        },
      },
      // Integration tests - real files and an in-process HTTP server
      {
        test: {
          name: 'integration',
          include: ['src/**/*.integration.{test,spec}.ts'],
          exclude: ['node_modules', 'dist'],
          environment: 'node',
          globals: true,
          testTimeout: 30000,
          hookTimeout: 30000,
          poolOptions: { forks: { singleFork: true } },
          env: {
            NODE_ENV: 'test',
            LOG_LEVEL: 'silent',
          },
        },
      },
    ],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['dist/**', '**/*.d.ts', 'src/test/**'],
    },
  },
});
