/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Readable } from 'node:stream';
import { describe, expect, it } from 'vitest';
import { readProjectIdLine } from './readProjectIdLine.js';

describe('readProjectIdLine', () => {
  it('resolves with the first line', async () => {
    const input = Readable.from(['my-project\nignored\n']);
    await expect(readProjectIdLine('workshop-abc', input)).resolves.toBe(
      'my-project',
    );
  });

  it('resolves with an empty answer at end of input', async () => {
    const input = Readable.from([]);
    await expect(readProjectIdLine('workshop-abc', input)).resolves.toBe('');
  });
});
