import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';

export default defineConfig({
  plugins: [react()],
  test: {
    globals: false,
    environment: 'node',
    include: ['backend/src/**/*.test.ts', 'frontend/src/**/*.test.tsx'],
    testTimeout: 10000,
    env: {
      LOG_LEVEL: 'error',
    },
  },
});
