import { fileURLToPath } from 'node:url';
import { defineProject } from 'vitest/config';

export default defineProject({
  test: {
    name: 'test-utils',
    environment: 'node',
    restoreMocks: true,
    setupFiles: [
      fileURLToPath(new URL('./src/env/mock-endoify.ts', import.meta.url)),
    ],
  },
});
