/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { GcloudClient } from './gcloudClient.js';
import { ExecutableNotFoundError } from './commandRunner.js';
import { FakeCommandRunner } from '../test-utils/fakeCommandRunner.js';
import {
  CreationError,
  GcloudCommandError,
  GcloudNotFoundError,
  LinkError,
  ProjectLookupError,
} from '../utils/errors.js';

describe('GcloudClient', () => {
  let runner: FakeCommandRunner;
  let client: GcloudClient;

  beforeEach(() => {
    runner = new FakeCommandRunner();
    client = new GcloudClient({ executable: 'gcloud', runner });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('getActiveAccount', () => {
    it('returns the first active account', async () => {
      runner.respond('auth list', { stdout: '\nstudent@example.com\n' });
      expect(await client.getActiveAccount()).toBe('student@example.com');
      expect(runner.calls[0]).toEqual({
        executable: 'gcloud',
        args: ['auth', 'list', '--filter=status:ACTIVE', '--format=value(account)'],
      });
    });

    it('returns undefined when no account is active', async () => {
      runner.respond('auth list', { stdout: '' });
      expect(await client.getActiveAccount()).toBeUndefined();
    });

    it('returns undefined when the command fails', async () => {
      runner.respond('auth list', { exitCode: 1, stdout: 'ignored' });
      expect(await client.getActiveAccount()).toBeUndefined();
    });
  });

  describe('listBillingAccounts', () => {
    it('parses the csv listing', async () => {
      runner.respond('billing accounts list', {
        stdout: '000000-AAAAAA-111111,Trial Billing Account,True\n',
      });
      expect(await client.listBillingAccounts()).toEqual([
        { id: '000000-AAAAAA-111111', displayName: 'Trial Billing Account', open: true },
      ]);
      expect(runner.callsTo('billing accounts list')).toEqual([
        'billing accounts list --format=csv[no-heading](ACCOUNT_ID,NAME,OPEN)',
      ]);
    });

    it('throws GcloudCommandError when the listing fails', async () => {
      runner.respond('billing accounts list', {
        exitCode: 2,
        stderr: 'ERROR: permission denied',
      });
      const error = await client.listBillingAccounts().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(GcloudCommandError);
      expect(error instanceof GcloudCommandError && error.message).toBe(
        'Command failed with exit code 2: gcloud billing accounts list --format=csv[no-heading](ACCOUNT_ID,NAME,OPEN)',
      );
      expect(error instanceof GcloudCommandError && error.detail).toBe(
        'ERROR: permission denied',
      );
    });
  });

  describe('projectExists', () => {
    it('maps the exit code', async () => {
      runner.respond('projects describe gone-project', { exitCode: 1 });
      expect(await client.projectExists('my-project')).toBe(true);
      expect(await client.projectExists('gone-project')).toBe(false);
    });
  });

  describe('getProjectBillingAccountId', () => {
    it('strips the billingAccounts/ prefix', async () => {
      runner.respond('billing projects describe my-project', {
        stdout: 'billingAccounts/000000-AAAAAA-111111\n',
      });
      expect(await client.getProjectBillingAccountId('my-project')).toBe(
        '000000-AAAAAA-111111',
      );
    });

    it('returns undefined when billing is not linked', async () => {
      runner.respond('billing projects describe my-project', { stdout: '\n' });
      expect(await client.getProjectBillingAccountId('my-project')).toBeUndefined();
    });

    it('throws ProjectLookupError when the lookup fails', async () => {
      runner.respond('billing projects describe my-project', {
        exitCode: 1,
        stderr: 'ERROR: forbidden',
      });
      await expect(
        client.getProjectBillingAccountId('my-project'),
      ).rejects.toBeInstanceOf(ProjectLookupError);
    });
  });

  describe('getLinkedBillingAccountName', () => {
    it('returns the display name', async () => {
      runner.respond('billing accounts describe 000000-AAAAAA-111111', {
        stdout: 'Trial Billing Account\n',
      });
      expect(
        await client.getLinkedBillingAccountName('my-project', '000000-AAAAAA-111111'),
      ).toBe('Trial Billing Account');
    });

    it('throws ProjectLookupError when the account cannot be read', async () => {
      runner.respond('billing accounts describe', {
        exitCode: 1,
        stderr: 'ERROR: PERMISSION_DENIED\n',
      });
      const error = await client
        .getLinkedBillingAccountName('my-project', '000000-AAAAAA-111111')
        .catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(ProjectLookupError);
      expect(error).toMatchObject({
        projectId: 'my-project',
        detail: 'ERROR: PERMISSION_DENIED',
      });
    });
  });

  describe('mutations', () => {
    it('creates a project named after its id', async () => {
      await client.createProject('my-project');
      expect(runner.callsTo('projects create')).toEqual([
        'projects create my-project --name=my-project',
      ]);
    });

    it('throws CreationError with stderr when creation fails', async () => {
      runner.respond('projects create', {
        exitCode: 1,
        stderr: 'ERROR: Project ID already in use',
      });
      await expect(client.createProject('my-project')).rejects.toMatchObject({
        name: 'CreationError',
        projectId: 'my-project',
        detail: 'ERROR: Project ID already in use',
      });
      await expect(client.createProject('my-project')).rejects.toBeInstanceOf(
        CreationError,
      );
    });

    it('links billing and throws LinkError on failure', async () => {
      await client.linkBillingAccount('my-project', '000000-AAAAAA-111111');
      expect(runner.callsTo('billing projects link')).toEqual([
        'billing projects link my-project --billing-account=000000-AAAAAA-111111',
      ]);

      runner.respond('billing projects link', { exitCode: 1 });
      await expect(
        client.linkBillingAccount('my-project', '000000-AAAAAA-111111'),
      ).rejects.toBeInstanceOf(LinkError);
    });

    it('sets the default project', async () => {
      await client.setDefaultProject('my-project');
      expect(runner.callsTo('config set')).toEqual(['config set project my-project']);
    });
  });

  it('throws GcloudNotFoundError when the executable is missing', async () => {
    const missing = new GcloudClient({
      executable: '/missing/gcloud',
      runner: {
        run: async (executable) => {
          throw new ExecutableNotFoundError(executable);
        },
      },
    });
    await expect(missing.getActiveAccount()).rejects.toBeInstanceOf(
      GcloudNotFoundError,
    );
  });

  it('logs commands only in debug mode', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    await client.setDefaultProject('my-project');
    expect(log).not.toHaveBeenCalled();

    const debugClient = new GcloudClient({ executable: 'gcloud', runner, debug: true });
    await debugClient.setDefaultProject('my-project');
    expect(log).toHaveBeenCalledWith(
      '[GcloudClient] running: gcloud config set project my-project',
    );
    expect(log).toHaveBeenCalledWith('[GcloudClient] exit code 0');
  });
});
