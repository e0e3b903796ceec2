import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/**/*.test.ts'],
    },
  },
  resolve: {
    alias: {
      '@config': path.resolve(__dirname, './src/config'),
      '@core': path.resolve(__dirname, './src/core'),
      '@shared': path.resolve(__dirname, './src/shared'),
      '@modules': path.resolve(__dirname, './src/modules'),
      '@identity': path.resolve(__dirname, './src/modules/identity/index.ts'),
      '@participants': path.resolve(__dirname, './src/modules/participants/index.ts'),
      '@events': path.resolve(__dirname, './src/modules/events/index.ts'),
      '@registrations': path.resolve(__dirname, './src/modules/registrations/index.ts'),
      '@reports': path.resolve(__dirname, './src/modules/reports/index.ts'),
      '@': path.resolve(__dirname, './src'),
    },
  },
});
