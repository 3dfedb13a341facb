/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@workshop-setup/core': fileURLToPath(
        new URL('./packages/core/src/index.ts', import.meta.url),
      ),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    // ink renders only a final frame when it detects CI, which hides the
    // frames ink-testing-library captures; render tests as on a terminal.
    env: { CI: 'false' },
    include: ['packages/*/src/**/*.test.{ts,tsx}'],
  },
});
