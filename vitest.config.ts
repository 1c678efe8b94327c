import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: [
        'src/domain/rules/**',
        'src/application/ingestion-store.ts',
        'src/application/transform-engine.ts',
        'src/application/clustering.ts',
        'src/application/analysis-engine.ts',
        'src/application/pipeline-orchestrator.ts',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
  },
});
