/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'node:path';
import { ConfigError } from '../utils/errors.js';
import {
  DEFAULT_PROJECT_ID_PREFIX,
  generateProjectId,
  isValidProjectId,
} from '../project/projectId.js';

export interface SetupConfig {
  /** Absolute path of the environment record. */
  envFile: string;
  /** Absolute path of the template copied when the record is missing. */
  envTemplateFile: string;
  /** Key holding the project id inside the environment record. */
  projectEnvKey: string;
  /** Prefix of the suggested project id. */
  projectIdPrefix: string;
  /** gcloud executable, resolved through PATH unless absolute. */
  gcloudPath: string;
  /** Substring identifying trial billing accounts by display name. */
  trialMarker: string;
  /** Enable debug logging */
  debug: boolean;
}

export const DEFAULT_ENV_FILE = '.env';
export const DEFAULT_ENV_TEMPLATE_FILE = '.env.example';
export const DEFAULT_PROJECT_ENV_KEY = 'GOOGLE_CLOUD_PROJECT';
export const DEFAULT_GCLOUD_PATH = 'gcloud';
export const TRIAL_MARKER = 'Trial';

const ENV_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const TRUTHY = ['1', 'true', 'yes'];

function readSetting(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: string,
): string {
  const raw = env[name]?.trim();
  return raw && raw.length > 0 ? raw : fallback;
}

function isDebugEnabled(env: NodeJS.ProcessEnv): boolean {
  return ['DEBUG', 'DEBUG_MODE'].some((name) =>
    TRUTHY.includes(String(env[name] ?? '').toLowerCase()),
  );
}

/**
 * Builds the setup configuration from `WORKSHOP_*` environment variables.
 * Relative paths resolve against `cwd`.
 */
export function loadSetupConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): SetupConfig {
  const projectEnvKey = readSetting(
    env,
    'WORKSHOP_PROJECT_ENV_KEY',
    DEFAULT_PROJECT_ENV_KEY,
  );
  if (!ENV_KEY_PATTERN.test(projectEnvKey)) {
    throw new ConfigError(
      `WORKSHOP_PROJECT_ENV_KEY must be a plain variable name, got "${projectEnvKey}".`,
    );
  }

  const projectIdPrefix = readSetting(
    env,
    'WORKSHOP_PROJECT_PREFIX',
    DEFAULT_PROJECT_ID_PREFIX,
  );
  // The suggestion must itself pass validation whatever the random suffix.
  const sample = generateProjectId(projectIdPrefix, (size) =>
    Buffer.alloc(size),
  );
  if (!isValidProjectId(sample)) {
    throw new ConfigError(
      `WORKSHOP_PROJECT_PREFIX "${projectIdPrefix}" cannot start a valid project ID.`,
    );
  }

  return {
    envFile: path.resolve(
      cwd,
      readSetting(env, 'WORKSHOP_ENV_FILE', DEFAULT_ENV_FILE),
    ),
    envTemplateFile: path.resolve(
      cwd,
      readSetting(env, 'WORKSHOP_ENV_TEMPLATE', DEFAULT_ENV_TEMPLATE_FILE),
    ),
    projectEnvKey,
    projectIdPrefix,
    gcloudPath: readSetting(env, 'WORKSHOP_GCLOUD_PATH', DEFAULT_GCLOUD_PATH),
    trialMarker: TRIAL_MARKER,
    debug: isDebugEnabled(env),
  };
}
