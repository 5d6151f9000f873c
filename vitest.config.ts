/**
 * @fileoverview Vitest configuration for the workspace
 *
 * @description
 * Runs every package's unit tests from their TypeScript sources.
 * Logging is silenced so test output only shows results.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/*/src/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
  },
})
