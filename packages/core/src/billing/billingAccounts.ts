/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  NoBillingAccountError,
  NoTrialAccountError,
} from '../utils/errors.js';
import type { BillingAccount, TrialAccountSelection } from './types.js';

const BILLING_ACCOUNT_PREFIX = 'billingAccounts/';

/**
 * Splits one CSV record. Quoted fields may contain commas and doubled quotes.
 */
export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

export function stripBillingAccountPrefix(value: string): string {
  const trimmed = value.trim();
  return trimmed.startsWith(BILLING_ACCOUNT_PREFIX)
    ? trimmed.slice(BILLING_ACCOUNT_PREFIX.length)
    : trimmed;
}

/**
 * Parses `csv[no-heading](ACCOUNT_ID,NAME,OPEN)` output by field position.
 */
export function parseBillingAccounts(csv: string): BillingAccount[] {
  const accounts: BillingAccount[] = [];
  for (const line of csv.split(/\r?\n/)) {
    if (!line.trim()) continue;
    const [id = '', displayName = '', open = ''] = parseCsvLine(line);
    const accountId = stripBillingAccountPrefix(id);
    if (!accountId) continue;
    accounts.push({
      id: accountId,
      displayName: displayName.trim(),
      open: open.trim().toLowerCase() === 'true',
    });
  }
  return accounts;
}

export function isTrialBillingAccountName(
  displayName: string,
  trialMarker: string,
): boolean {
  return displayName.includes(trialMarker);
}

export function isOpenTrialAccount(
  account: BillingAccount,
  trialMarker: string,
): boolean {
  return account.open && isTrialBillingAccountName(account.displayName, trialMarker);
}

/**
 * Picks the trial account to link. The listing carries no creation time,
 * so the last open trial account in listing order wins.
 */
export function selectTrialBillingAccount(
  accounts: BillingAccount[],
  trialMarker: string,
): TrialAccountSelection {
  if (accounts.length === 0) {
    throw new NoBillingAccountError();
  }

  const candidates: BillingAccount[] = [];
  let selected: BillingAccount | undefined;
  for (const account of accounts) {
    if (isOpenTrialAccount(account, trialMarker)) {
      candidates.push(account);
      selected = account;
    }
  }

  if (!selected) {
    throw new NoTrialAccountError(accounts);
  }
  return { selected, candidates };
}
