/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { randomBytes } from 'node:crypto';

export const PROJECT_ID_PATTERN = /^[a-z][a-z0-9-]{4,28}[a-z0-9]$/;

export const DEFAULT_PROJECT_ID_PREFIX = 'workshop-';

const SUFFIX_BYTES = 6;

export const PROJECT_ID_RULES: readonly string[] = [
  'Be 6 to 30 characters',
  'Start with a lowercase letter',
  'Contain only lowercase letters, digits, and hyphens',
  'Not end with a hyphen',
];

export function isValidProjectId(projectId: string): boolean {
  return PROJECT_ID_PATTERN.test(projectId);
}

/**
 * Suggests a project id such as `workshop-3f9a0c11d2e4`.
 */
export function generateProjectId(
  prefix: string = DEFAULT_PROJECT_ID_PREFIX,
  random: (size: number) => Buffer = randomBytes,
): string {
  return `${prefix}${random(SUFFIX_BYTES).toString('hex')}`;
}

/**
 * Resolves the id typed at the prompt: surrounding whitespace is dropped
 * and an empty answer takes the suggestion.
 */
export function resolveProjectIdInput(input: string, suggested: string): string {
  const trimmed = input.trim();
  return trimmed.length > 0 ? trimmed : suggested;
}
