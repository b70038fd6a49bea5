import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Tests open loopback sockets; keep them from competing for ports and CPU
    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks: 2,
        minForks: 1,
      },
    },
    maxConcurrency: 3,
    fileParallelism: false,

    include: ['test/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/types/**',
        'src/index.ts',
        'src/constants.ts', // Constants only
        'src/cli/bin.ts', // Process entry point
        'src/testing/index.ts', // Re-export only
      ],
    },
  },
});
