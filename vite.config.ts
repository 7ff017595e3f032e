/**
 * Vite Configuration
 *
 * WHAT: Dev server, build and Vitest settings for the overlay demo.
 *
 * HOW: React plugin for JSX; tests run in jsdom with globals and a
 * shared setup file that resets the loading store between tests.
 */

import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';

export default defineConfig({
  plugins: [react()],

  test: {
    globals: true,
    environment: 'jsdom',
    setupFiles: ['./src/test/setup.ts'],
    include: ['src/**/*.{test,spec}.{ts,tsx}'],
    restoreMocks: true,
  },
});
