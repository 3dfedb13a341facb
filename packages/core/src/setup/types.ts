/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { BillingAccount } from '../billing/types.js';
import type { EnvWriteOutcome } from '../env/envFile.js';

export type SetupStepId =
  | 'auth'
  | 'billing'
  | 'existing-project'
  | 'create-project'
  | 'link-billing'
  | 'activate'
  | 'persist';

export type SetupEvent =
  | { type: 'step'; step: SetupStepId; title: string }
  | { type: 'info'; message: string }
  | { type: 'success'; message: string }
  | { type: 'warning'; message: string }
  | {
      type: 'trial-accounts';
      candidates: BillingAccount[];
      selected: BillingAccount;
    };

export type SetupEventListener = (event: SetupEvent) => void;

/**
 * Asks the user for a project id. Resolves with the raw answer (an empty
 * string takes the suggestion) and rejects with SetupCancelledError when
 * the user backs out.
 */
export type ProjectIdPrompter = (suggestedId: string) => Promise<string>;

export type SetupStatus = 'already-configured' | 'configured';

export interface SetupResult {
  status: SetupStatus;
  account: string;
  projectId: string;
  billingAccountId: string;
  billingAccountName?: string;
  projectCreated: boolean;
  envFile: string;
  /** Absent when the environment file was left untouched. */
  envWrite?: EnvWriteOutcome;
}
