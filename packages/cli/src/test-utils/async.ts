/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/** Lets Ink attach its input listeners before the test writes to stdin. */
export const flushInput = (ms = 20) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));
