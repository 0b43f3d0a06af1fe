import { fileURLToPath } from 'url'

import { defineConfig } from 'vitest/config'

function fromRoot(relative: string): string {
  return fileURLToPath(new URL(relative, import.meta.url))
}

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    // serialport's native binding does not load in worker threads
    isolate: true,
    pool: 'forks',

    mockReset: true,
    clearMocks: true,
    restoreMocks: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        '**/*.test.ts',
        '**/*.config.ts',
        'coverage/**',
        'dist/**',
        'test/**',
        'src/boot/main.ts',
        'src/hardware/serial-link/node-port.ts',
      ],
      thresholds: {
        branches: 85,
        functions: 90,
        lines: 90,
        statements: 90,
      },
    },

    include: ['src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '$types': fromRoot('./src/types'),
      '$test-utils': fromRoot('./test'),
      '@boot': fromRoot('./src/boot'),
      '@core': fromRoot('./src/core'),
      '@features': fromRoot('./src/features'),
      '@hardware': fromRoot('./src/hardware'),
      '@logging': fromRoot('./src/logging'),
      '@network': fromRoot('./src/network'),
      '@system': fromRoot('./src/system'),
      '@utils': fromRoot('./src/utils'),
      '@validation': fromRoot('./src/validation'),
    },
  },
})
