#!/usr/bin/env node

/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { main } from './main.js';

main().then(
  (exitCode) => process.exit(exitCode),
  (error: unknown) => {
    console.error('Unexpected error during setup:', error);
    process.exit(1);
  },
);
