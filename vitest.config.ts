import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@suidao/shared': new URL('./packages/shared/src/index.ts', import.meta.url).pathname,
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/test/**/*.test.ts'],
    testTimeout: 15000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      // 覆盖所有源文件
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'node_modules/',
        '**/*.test.ts',
        '**/*.d.ts',
        '**/dist/**',
        '**/test/**',
        // CLI 入口文件 - 仅做参数解析
        'packages/client/src/cli.ts',
      ],
      thresholds: {
        lines: 50,
        functions: 50,
        branches: 50,
        statements: 50,
      },
    },
  },
});
