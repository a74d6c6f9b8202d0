import { fileURLToPath } from 'node:url';
import { defineProject } from 'vitest/config';

export default defineProject({
  test: {
    name: 'mtls-worker',
    environment: 'node',
    restoreMocks: true,
    setupFiles: [
      fileURLToPath(
        new URL('../test-utils/src/env/mock-endoify.ts', import.meta.url),
      ),
    ],
  },
});
