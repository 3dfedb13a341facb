/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { BillingAccount } from '../billing/types.js';
import { PROJECT_ID_RULES } from '../project/projectId.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 130;

export interface SetupErrorOptions {
  /** Extra diagnostic text, usually stderr captured from gcloud. */
  detail?: string;
  /** Follow-up instructions shown to the user below the message. */
  hints?: string[];
  exitCode?: number;
}

/**
 * Base class for every terminal failure of the setup flow.
 */
export class SetupError extends Error {
  readonly exitCode: number;
  readonly detail?: string;
  readonly hints: string[];

  constructor(message: string, options: SetupErrorOptions = {}) {
    super(message);
    this.name = new.target.name;
    this.exitCode = options.exitCode ?? EXIT_FAILURE;
    this.detail = options.detail?.trim() || undefined;
    this.hints = options.hints ?? [];
  }
}

export class AuthenticationError extends SetupError {
  constructor() {
    super('You are not authenticated with Google Cloud!', {
      hints: [
        'If using Cloud Shell: gcloud auth login --no-launch-browser',
        'For local development: gcloud auth login',
        'After authenticating, run this setup again.',
      ],
    });
  }
}

export class NoBillingAccountError extends SetupError {
  constructor() {
    super('No billing accounts found!', {
      hints: [
        'This workshop requires a Google Cloud trial billing account.',
        'Please ensure you have claimed your trial credit first.',
      ],
    });
  }
}

export class NoTrialAccountError extends SetupError {
  constructor(readonly accounts: BillingAccount[]) {
    super('No active trial billing account found!', {
      hints: [
        "You haven't claimed your free trial credit yet, or",
        'your trial billing account is closed/expired (OPEN: False).',
        'Trial accounts with OPEN: False are expired and cannot be used.',
      ],
    });
  }
}

export class ProjectLookupError extends SetupError {
  constructor(
    readonly projectId: string,
    detail?: string,
  ) {
    super(`Failed to read billing information for project ${projectId}.`, {
      detail,
      hints: [
        'Check that your account can view billing for this project, or',
        'remove the project ID from your environment file and run this setup again.',
      ],
    });
  }
}

export class InvalidIdentifierError extends SetupError {
  constructor(readonly projectId: string) {
    super(`Invalid project ID "${projectId}". Project ID must:`, {
      hints: [...PROJECT_ID_RULES],
    });
  }
}

export class CreationError extends SetupError {
  constructor(
    readonly projectId: string,
    detail?: string,
  ) {
    super(
      `Failed to create project ${projectId}. The ID might already be taken.`,
      { detail },
    );
  }
}

export class LinkError extends SetupError {
  constructor(
    readonly projectId: string,
    readonly billingAccountId: string,
    detail?: string,
  ) {
    super(
      `Failed to link billing account ${billingAccountId} to project ${projectId}.`,
      { detail },
    );
  }
}

export class GcloudNotFoundError extends SetupError {
  constructor(readonly executable: string) {
    super(`The gcloud CLI was not found (tried "${executable}").`, {
      hints: [
        'Install the Google Cloud SDK: https://cloud.google.com/sdk/docs/install',
        'or point WORKSHOP_GCLOUD_PATH at an existing gcloud executable.',
      ],
    });
  }
}

export class GcloudCommandError extends SetupError {
  constructor(
    readonly command: string,
    readonly commandExitCode: number | null,
    stderr: string,
  ) {
    super(
      `Command failed with exit code ${commandExitCode ?? 'unknown'}: ${command}`,
      { detail: stderr },
    );
  }
}

export class ConfigError extends SetupError {}

export class SetupCancelledError extends SetupError {
  constructor() {
    super('Setup cancelled.', { exitCode: EXIT_CANCELLED });
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return String(error);
  } catch {
    return 'Failed to get error details';
  }
}

export function getExitCode(error: unknown): number {
  return error instanceof SetupError ? error.exitCode : EXIT_FAILURE;
}
