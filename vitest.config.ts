import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@tracklift/contracts': path.resolve(rootDir, 'packages/contracts/src/index.ts'),
      '@tracklift/providers-core': path.resolve(rootDir, 'packages/providers/core/src/index.ts'),
      '@tracklift/providers-spotify': path.resolve(rootDir, 'packages/providers/spotify/src/index.ts'),
      '@tracklift/providers-youtube': path.resolve(rootDir, 'packages/providers/youtube/src/index.ts'),
    },
  },
  test: {
    include: [
      'packages/**/test/**/*.test.ts',
      'apps/**/src/**/__tests__/**/*.test.ts',
    ],
    testTimeout: 30000,
    pool: 'threads',
    server: {
      deps: {
        inline: ['fastify', '@tracklift/contracts', 'nanoid'],
      },
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: [
        'apps/*/src/**',
        'packages/**/src/**',
      ],
      exclude: [
        '**/__tests__/**',
        '**/test/**',
        '**/*.test.ts',
        '**/node_modules/**',
        '**/dist/**',
        'apps/api/src/dev/**',
      ],
    },
  },
});
