import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const fromRoot = (dir: string) => fileURLToPath(new URL(dir, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@config': fromRoot('./src/config'),
      '@core': fromRoot('./src/core'),
      '@infra': fromRoot('./src/infrastructure'),
      '@services': fromRoot('./src/services'),
      '@utils': fromRoot('./src/utils'),
      '@api': fromRoot('./src/api'),
      '@middleware': fromRoot('./src/middleware'),
      '@test': fromRoot('./src/test'),
    },
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./src/test/setupEnv.ts'],
  },
});
