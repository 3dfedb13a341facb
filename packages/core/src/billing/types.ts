/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export interface BillingAccount {
  /** Account id without the `billingAccounts/` prefix, e.g. `0X0X0X-0X0X0X-0X0X0X`. */
  id: string;
  displayName: string;
  open: boolean;
}

export interface TrialAccountSelection {
  selected: BillingAccount;
  /** Every open trial account, in listing order. */
  candidates: BillingAccount[];
}
