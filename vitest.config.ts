import { defineConfig, coverageConfigDefaults } from 'vitest/config'
import react from '@vitejs/plugin-react'
import { resolve, dirname } from 'path'
import { fileURLToPath } from 'url'

const __dirname = dirname(fileURLToPath(import.meta.url))
const isCI = process.env.CI === 'true'

export default defineConfig({
  plugins: [react()],
  resolve: {
    alias: {
      '@clockface/core': resolve(__dirname, 'packages/core/src'),
      '@clockface/renderer': resolve(__dirname, 'packages/renderer/src'),
      '@clockface/server': resolve(__dirname, 'packages/server/src'),
    },
  },
  test: {
    include: [
      'packages/*/src/**/*.test.ts',
      'packages/*/src/**/*.test.tsx',
    ],
    // Web tests opt into jsdom with a per-file environment comment
    environment: 'node',

    coverage: {
      provider: 'v8',
      reporter: isCI ? ['text', 'json', 'lcov'] : ['text', 'html'],
      reportsDirectory: './coverage',

      include: ['packages/*/src/**/*.{ts,tsx}'],

      exclude: [
        ...coverageConfigDefaults.exclude,
        '**/*.test.ts',
        '**/*.test.tsx',
        '**/__tests__/**',
        '**/*.d.ts',
        '**/test-setup.ts',
        '**/*.config.ts',
        '**/index.ts',
        'packages/server/src/cli.ts',
        'packages/web/src/main.tsx',
      ],

      thresholds: {
        lines: 60,
        branches: 50,
        functions: 60,
        statements: 60,
      },
    },
  },
})
