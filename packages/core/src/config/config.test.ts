/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import * as path from 'node:path';
import { loadSetupConfig } from './config.js';
import { ConfigError } from '../utils/errors.js';

const CWD = path.resolve('/tmp/workshop');

describe('loadSetupConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadSetupConfig({}, CWD)).toEqual({
      envFile: path.join(CWD, '.env'),
      envTemplateFile: path.join(CWD, '.env.example'),
      projectEnvKey: 'GOOGLE_CLOUD_PROJECT',
      projectIdPrefix: 'workshop-',
      gcloudPath: 'gcloud',
      trialMarker: 'Trial',
      debug: false,
    });
  });

  it('reads overrides from WORKSHOP_* variables', () => {
    const config = loadSetupConfig(
      {
        WORKSHOP_ENV_FILE: 'config/app.env',
        WORKSHOP_ENV_TEMPLATE: 'config/app.env.sample',
        WORKSHOP_PROJECT_ENV_KEY: 'PROJECT_ID',
        WORKSHOP_PROJECT_PREFIX: 'lab-',
        WORKSHOP_GCLOUD_PATH: '/opt/google-cloud-sdk/bin/gcloud',
      },
      CWD,
    );
    expect(config.envFile).toBe(path.join(CWD, 'config', 'app.env'));
    expect(config.envTemplateFile).toBe(path.join(CWD, 'config', 'app.env.sample'));
    expect(config.projectEnvKey).toBe('PROJECT_ID');
    expect(config.projectIdPrefix).toBe('lab-');
    expect(config.gcloudPath).toBe('/opt/google-cloud-sdk/bin/gcloud');
  });

  it('ignores blank overrides', () => {
    expect(loadSetupConfig({ WORKSHOP_ENV_FILE: '  ' }, CWD).envFile).toBe(
      path.join(CWD, '.env'),
    );
  });

  it.each([
    [{ DEBUG: '1' }, true],
    [{ DEBUG_MODE: 'true' }, true],
    [{ DEBUG: '0' }, false],
  ])('derives debug from %o', (env, expected) => {
    expect(loadSetupConfig(env, CWD).debug).toBe(expected);
  });

  it('rejects an env key that is not a plain variable name', () => {
    expect(() =>
      loadSetupConfig({ WORKSHOP_PROJECT_ENV_KEY: 'MY KEY' }, CWD),
    ).toThrow(ConfigError);
  });

  it('rejects a prefix that cannot start a valid project id', () => {
    expect(() =>
      loadSetupConfig({ WORKSHOP_PROJECT_PREFIX: 'Workshop-' }, CWD),
    ).toThrow(
      'WORKSHOP_PROJECT_PREFIX "Workshop-" cannot start a valid project ID.',
    );
  });
});
