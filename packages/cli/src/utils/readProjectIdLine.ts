/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { createInterface } from 'node:readline';

/**
 * Reads the project id as one line from a non-interactive stdin. End of
 * input without a line answers with an empty string, which takes the
 * suggested id.
 */
export function readProjectIdLine(
  _suggestedId: string,
  input: NodeJS.ReadableStream = process.stdin,
): Promise<string> {
  return new Promise((resolve) => {
    const rl = createInterface({ input, terminal: false });
    let answered = false;

    rl.once('line', (line) => {
      answered = true;
      rl.close();
      resolve(line);
    });
    rl.once('close', () => {
      if (!answered) {
        resolve('');
      }
    });
  });
}
