import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    // File transports off; everything goes to the console at warn and above
    env: {
      NODE_ENV: 'test',
      LOG_FILE: 'false',
      LOG_LEVEL: 'warn',
    },
  },
});
