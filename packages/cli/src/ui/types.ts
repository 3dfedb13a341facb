/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  BillingAccount,
  ProjectIdPrompter,
  SetupEventListener,
  SetupResult,
} from '@workshop-setup/core';

export type LogEntry =
  | { id: number; type: 'step'; title: string }
  | { id: number; type: 'info' | 'success' | 'warning'; message: string }
  | {
      id: number;
      type: 'trial-accounts';
      candidates: BillingAccount[];
      selected: BillingAccount;
    };

export type SetupPhase =
  | { kind: 'running' }
  | { kind: 'prompt'; suggestedId: string }
  | { kind: 'done'; result: SetupResult }
  | { kind: 'failed'; error: unknown };

export interface SetupHooks {
  promptProjectId: ProjectIdPrompter;
  onEvent: SetupEventListener;
}

/** Runs the whole setup flow against the given UI hooks. */
export type SetupRunner = (hooks: SetupHooks) => Promise<SetupResult>;
