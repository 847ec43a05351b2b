import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  cacheDir: path.resolve(process.env.TMPDIR ?? '/tmp', 'bbcx-vitest-cache'),
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
