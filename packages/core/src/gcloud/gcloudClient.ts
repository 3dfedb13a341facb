/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  parseBillingAccounts,
  stripBillingAccountPrefix,
} from '../billing/billingAccounts.js';
import type { BillingAccount } from '../billing/types.js';
import {
  CreationError,
  GcloudCommandError,
  GcloudNotFoundError,
  LinkError,
  ProjectLookupError,
} from '../utils/errors.js';
import {
  ExecutableNotFoundError,
  SpawnCommandRunner,
  type CommandResult,
  type CommandRunner,
} from './commandRunner.js';

export interface GcloudClientOptions {
  /** gcloud executable */
  executable: string;
  runner?: CommandRunner;
  /** Enable debug logging */
  debug?: boolean;
}

/**
 * Thin typed wrapper over the gcloud commands the setup flow needs.
 * Output is requested in `value(...)` or CSV form and parsed by position.
 */
export class GcloudClient {
  private readonly executable: string;
  private readonly runner: CommandRunner;
  private readonly debugEnabled: boolean;

  constructor(options: GcloudClientOptions) {
    this.executable = options.executable;
    this.runner = options.runner ?? new SpawnCommandRunner();
    this.debugEnabled = options.debug ?? false;
  }

  /**
   * Returns the active account, or undefined when nobody is logged in.
   */
  async getActiveAccount(): Promise<string | undefined> {
    const result = await this.exec([
      'auth',
      'list',
      '--filter=status:ACTIVE',
      '--format=value(account)',
    ]);
    if (result.exitCode !== 0) {
      return undefined;
    }
    return firstLine(result.stdout);
  }

  async listBillingAccounts(): Promise<BillingAccount[]> {
    const result = await this.execOrThrow([
      'billing',
      'accounts',
      'list',
      '--format=csv[no-heading](ACCOUNT_ID,NAME,OPEN)',
    ]);
    return parseBillingAccounts(result.stdout);
  }

  async projectExists(projectId: string): Promise<boolean> {
    const result = await this.exec([
      'projects',
      'describe',
      projectId,
      '--format=value(projectId)',
    ]);
    return result.exitCode === 0;
  }

  /**
   * Returns the id of the billing account linked to the project, or
   * undefined when billing is not linked.
   */
  async getProjectBillingAccountId(
    projectId: string,
  ): Promise<string | undefined> {
    const result = await this.exec([
      'billing',
      'projects',
      'describe',
      projectId,
      '--format=value(billingAccountName)',
    ]);
    if (result.exitCode !== 0) {
      throw new ProjectLookupError(projectId, result.stderr);
    }
    const name = firstLine(result.stdout);
    return name ? stripBillingAccountPrefix(name) : undefined;
  }

  /**
   * Returns the display name of the billing account linked to `projectId`.
   * Throws ProjectLookupError when the account cannot be read, for instance
   * without billing viewer permission.
   */
  async getLinkedBillingAccountName(
    projectId: string,
    billingAccountId: string,
  ): Promise<string | undefined> {
    const result = await this.exec([
      'billing',
      'accounts',
      'describe',
      billingAccountId,
      '--format=value(displayName)',
    ]);
    if (result.exitCode !== 0) {
      throw new ProjectLookupError(projectId, result.stderr);
    }
    return firstLine(result.stdout);
  }

  async createProject(projectId: string): Promise<void> {
    const result = await this.exec([
      'projects',
      'create',
      projectId,
      `--name=${projectId}`,
    ]);
    if (result.exitCode !== 0) {
      throw new CreationError(projectId, result.stderr);
    }
  }

  async linkBillingAccount(
    projectId: string,
    billingAccountId: string,
  ): Promise<void> {
    const result = await this.exec([
      'billing',
      'projects',
      'link',
      projectId,
      `--billing-account=${billingAccountId}`,
    ]);
    if (result.exitCode !== 0) {
      throw new LinkError(projectId, billingAccountId, result.stderr);
    }
  }

  async setDefaultProject(projectId: string): Promise<void> {
    await this.execOrThrow(['config', 'set', 'project', projectId]);
  }

  private async execOrThrow(args: string[]): Promise<CommandResult> {
    const result = await this.exec(args);
    if (result.exitCode !== 0) {
      throw new GcloudCommandError(
        this.describe(args),
        result.exitCode,
        result.stderr,
      );
    }
    return result;
  }

  private async exec(args: string[]): Promise<CommandResult> {
    this.debug(`running: ${this.describe(args)}`);
    let result: CommandResult;
    try {
      result = await this.runner.run(this.executable, args);
    } catch (error) {
      if (error instanceof ExecutableNotFoundError) {
        throw new GcloudNotFoundError(this.executable);
      }
      throw error;
    }
    this.debug(`exit code ${result.exitCode ?? 'null'}`);
    if (result.exitCode !== 0 && result.stderr.trim()) {
      this.debug(`stderr: ${result.stderr.trim()}`);
    }
    return result;
  }

  private describe(args: string[]): string {
    return [this.executable, ...args].join(' ');
  }

  private debug(message: string): void {
    if (this.debugEnabled) {
      console.log(`[GcloudClient] ${message}`);
    }
  }
}

function firstLine(output: string): string | undefined {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => line.length > 0);
}
