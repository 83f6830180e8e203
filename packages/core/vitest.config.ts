/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'core',
    include: ['src/**/*.test.ts'],
    reporters: ['default'],
    testTimeout: 30000,
    silent: true,
    setupFiles: ['./test-setup.ts'],
  },
});
