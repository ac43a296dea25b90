export const sharedVitestConfig = {
  test: {
    globals: true,
    silent: true,
    // nock patches the global fetch per worker; keep suites isolated.
    pool: 'forks' as const,
    coverage: {
      provider: 'v8' as const,
      reporter: ['text', 'html'],
      all: true,
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.test.ts',
        // Type-only contracts have no runtime to execute.
        'src/types/**/*.ts',
        'src/bin.ts',
      ],
      thresholds: {
        lines: 90,
        functions: 90,
        branches: 85,
        statements: 90,
      },
    },
  },
};
