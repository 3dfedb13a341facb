/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'node:path';
import {
  isTrialBillingAccountName,
  selectTrialBillingAccount,
} from '../billing/billingAccounts.js';
import type { TrialAccountSelection } from '../billing/types.js';
import type { SetupConfig } from '../config/config.js';
import {
  persistEnvValue,
  readEnvValue,
  type EnvWriteOutcome,
} from '../env/envFile.js';
import type { GcloudClient } from '../gcloud/gcloudClient.js';
import {
  generateProjectId,
  isValidProjectId,
  resolveProjectIdInput,
} from '../project/projectId.js';
import {
  AuthenticationError,
  InvalidIdentifierError,
} from '../utils/errors.js';
import type {
  ProjectIdPrompter,
  SetupEvent,
  SetupEventListener,
  SetupResult,
  SetupStepId,
} from './types.js';

export interface ProjectSetupOptions {
  config: SetupConfig;
  gcloud: GcloudClient;
  promptProjectId: ProjectIdPrompter;
  onEvent?: SetupEventListener;
  /** Produces the suggested project id; defaults to a random one. */
  suggestProjectId?: () => string;
}

type ExistingProjectCheck =
  | { kind: 'none' }
  | { kind: 'ready'; projectId: string; billingAccountId: string; billingAccountName: string }
  | { kind: 'link-only'; projectId: string };

/**
 * Walks the onboarding flow: authentication, trial billing discovery,
 * validation of a previously recorded project, project creation, billing
 * link, activation and persistence. Every failure is thrown as a
 * SetupError subclass; nothing is rolled back.
 */
export class ProjectSetup {
  private readonly config: SetupConfig;
  private readonly gcloud: GcloudClient;
  private readonly promptProjectId: ProjectIdPrompter;
  private readonly onEvent: SetupEventListener;
  private readonly suggestProjectId: () => string;

  constructor(options: ProjectSetupOptions) {
    this.config = options.config;
    this.gcloud = options.gcloud;
    this.promptProjectId = options.promptProjectId;
    this.onEvent = options.onEvent ?? (() => {});
    this.suggestProjectId =
      options.suggestProjectId ??
      (() => generateProjectId(this.config.projectIdPrefix));
  }

  async run(): Promise<SetupResult> {
    const account = await this.checkAuthentication();
    const { selected } = await this.findTrialBillingAccount();

    const existing = await this.checkExistingProject();
    if (existing.kind === 'ready') {
      await this.activate(existing.projectId);
      return {
        status: 'already-configured',
        account,
        projectId: existing.projectId,
        billingAccountId: existing.billingAccountId,
        billingAccountName: existing.billingAccountName,
        projectCreated: false,
        envFile: this.config.envFile,
      };
    }

    let projectId: string;
    let projectCreated = false;
    if (existing.kind === 'link-only') {
      projectId = existing.projectId;
      this.step('create-project', 'Using existing project');
      this.emit({ type: 'success', message: `Skipping project creation for ${projectId}` });
    } else {
      projectId = await this.createProject();
      projectCreated = true;
    }

    await this.linkBilling(projectId, selected.id);
    await this.activate(projectId);
    const envWrite = await this.persist(projectId);

    return {
      status: 'configured',
      account,
      projectId,
      billingAccountId: selected.id,
      billingAccountName: selected.displayName,
      projectCreated,
      envFile: this.config.envFile,
      envWrite,
    };
  }

  private async checkAuthentication(): Promise<string> {
    this.step('auth', 'Checking gcloud authentication');
    const account = await this.gcloud.getActiveAccount();
    if (!account) {
      throw new AuthenticationError();
    }
    this.emit({ type: 'success', message: `Authenticated as: ${account}` });
    return account;
  }

  private async findTrialBillingAccount(): Promise<TrialAccountSelection> {
    this.step('billing', 'Checking for trial billing account');
    const accounts = await this.gcloud.listBillingAccounts();
    const selection = selectTrialBillingAccount(
      accounts,
      this.config.trialMarker,
    );
    this.emit({
      type: 'trial-accounts',
      candidates: selection.candidates,
      selected: selection.selected,
    });
    return selection;
  }

  private async checkExistingProject(): Promise<ExistingProjectCheck> {
    const { envFile, projectEnvKey, trialMarker } = this.config;
    const projectId = await readEnvValue(envFile, projectEnvKey);
    if (!projectId) {
      return { kind: 'none' };
    }

    this.step('existing-project', 'Validating existing project');
    this.emit({
      type: 'info',
      message: `Found ${projectEnvKey}=${projectId} in ${this.envFileName()}`,
    });

    // Checked before the id reaches gcloud, where `--help` would parse as a flag.
    if (!isValidProjectId(projectId)) {
      this.emit({
        type: 'warning',
        message: `${projectId} is not a valid project ID. Creating a new project.`,
      });
      return { kind: 'none' };
    }

    if (!(await this.gcloud.projectExists(projectId))) {
      this.emit({
        type: 'warning',
        message: `Project ${projectId} does not exist in Google Cloud or has been deleted. Creating a new project.`,
      });
      return { kind: 'none' };
    }
    this.emit({ type: 'success', message: 'Project exists in Google Cloud' });

    const billingAccountId =
      await this.gcloud.getProjectBillingAccountId(projectId);
    if (!billingAccountId) {
      this.emit({
        type: 'warning',
        message: 'Project exists but has no billing account linked. Linking trial billing account to this project.',
      });
      return { kind: 'link-only', projectId };
    }

    const billingAccountName = await this.gcloud.getLinkedBillingAccountName(
      projectId,
      billingAccountId,
    );
    if (
      billingAccountName &&
      isTrialBillingAccountName(billingAccountName, trialMarker)
    ) {
      this.emit({
        type: 'success',
        message: `Linked to trial billing account: ${billingAccountName}`,
      });
      return { kind: 'ready', projectId, billingAccountId, billingAccountName };
    }

    this.emit({
      type: 'warning',
      message: `Project is linked to non-trial billing: ${billingAccountName ?? billingAccountId}. Creating a new project with trial billing.`,
    });
    return { kind: 'none' };
  }

  private async createProject(): Promise<string> {
    this.step('create-project', 'Creating a new project');
    const suggested = this.suggestProjectId();
    const answer = await this.promptProjectId(suggested);
    const projectId = resolveProjectIdInput(answer, suggested);
    if (!isValidProjectId(projectId)) {
      throw new InvalidIdentifierError(projectId);
    }

    this.emit({ type: 'info', message: `Creating project: ${projectId}` });
    await this.gcloud.createProject(projectId);
    this.emit({ type: 'success', message: 'Project created successfully!' });
    return projectId;
  }

  private async linkBilling(
    projectId: string,
    billingAccountId: string,
  ): Promise<void> {
    this.step('link-billing', 'Linking trial billing account');
    await this.gcloud.linkBillingAccount(projectId, billingAccountId);
    this.emit({ type: 'success', message: 'Billing account linked successfully!' });
  }

  private async activate(projectId: string): Promise<void> {
    this.step('activate', 'Setting as default project');
    await this.gcloud.setDefaultProject(projectId);
    this.emit({ type: 'success', message: `Default project set to: ${projectId}` });
  }

  private async persist(projectId: string): Promise<EnvWriteOutcome> {
    const { envFile, envTemplateFile, projectEnvKey } = this.config;
    const envName = this.envFileName();
    this.step('persist', `Saving to ${envName}`);

    const outcome = await persistEnvValue({
      envFile,
      templateFile: envTemplateFile,
      key: projectEnvKey,
      value: projectId,
    });

    const templateName = path.basename(envTemplateFile);
    const messages: Record<EnvWriteOutcome, string> = {
      updated: `Updated ${projectEnvKey} in existing ${envName}`,
      appended: `Appended ${projectEnvKey} to existing ${envName}`,
      'created-from-template': `Created ${envName} from ${templateName} template`,
      created: `Created new ${envName}`,
    };
    this.emit({ type: 'success', message: messages[outcome] });
    return outcome;
  }

  private envFileName(): string {
    return path.basename(this.config.envFile);
  }

  private step(step: SetupStepId, title: string): void {
    this.emit({ type: 'step', step, title });
  }

  private emit(event: SetupEvent): void {
    this.onEvent(event);
  }
}
