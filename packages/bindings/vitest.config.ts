import { fileURLToPath } from 'node:url';
import { defineProject } from 'vitest/config';

export default defineProject({
  test: {
    name: 'bindings',
    environment: 'node',
    restoreMocks: true,
    setupFiles: [
      fileURLToPath(
        new URL('../test-utils/src/env/mock-endoify.ts', import.meta.url),
      ),
    ],
  },
});
