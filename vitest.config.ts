import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const root = (dir: string) => fileURLToPath(new URL(dir, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.spec.ts'],
    setupFiles: ['tests/test-setup.ts']
  },
  resolve: {
    alias: {
      '@/lib': root('./lib'),
      '@/types': root('./types'),
      '@/config': root('./config')
    }
  }
});
