/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/** @vitest-environment jsdom */

import { render } from 'ink-testing-library';
import { describe, it, expect } from 'vitest';
import type { SetupResult } from '@workshop-setup/core';
import { SetupSummary } from './SetupSummary.js';

const configured: SetupResult = {
  status: 'configured',
  account: 'student@example.com',
  projectId: 'workshop-0123456789ab',
  billingAccountId: '0000AA-BBBBBB-CCCCCC',
  billingAccountName: 'My Trial Account',
  projectCreated: true,
  envFile: '/tmp/lab/.env',
  envWrite: 'created',
};

describe('SetupSummary', () => {
  it('should show the completion summary for a configured project', () => {
    const { lastFrame } = render(
      <SetupSummary result={configured} envKey="GOOGLE_CLOUD_PROJECT" />,
    );

    const output = lastFrame();
    expect(output).toContain('Setup Complete!');
    expect(output).toContain('workshop-0123456789ab');
    expect(output).toContain('0000AA-BBBBBB-CCCCCC');
    expect(output).toContain('.env');
    expect(output).toContain('You can now proceed with the workshop!');
    expect(output).toContain('gcloud config get-value project');
  });

  it('should tell the user nothing is needed when already configured', () => {
    const { lastFrame } = render(
      <SetupSummary
        result={{
          ...configured,
          status: 'already-configured',
          projectCreated: false,
          envWrite: undefined,
        }}
        envKey="GOOGLE_CLOUD_PROJECT"
      />,
    );

    const output = lastFrame();
    expect(output).toContain('Project Already Set Up!');
    expect(output).toContain('Your environment is ready. No action needed!');
    expect(output).not.toContain('Setup Complete!');
  });
});
