import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const dir = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@components': dir('./src/components'),
      '@core': dir('./src/core'),
      '@hooks': dir('./src/hooks'),
      '@render': dir('./src/render'),
      '@themes': dir('./src/themes'),
      '@utils': dir('./src/utils'),
      '@views': dir('./src/views'),
    },
  },
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
  },
});
