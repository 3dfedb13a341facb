/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './config/config.js';
export * from './utils/errors.js';
export * from './billing/types.js';
export * from './billing/billingAccounts.js';
export * from './project/projectId.js';
export * from './env/envFile.js';
export * from './gcloud/commandRunner.js';
export * from './gcloud/gcloudClient.js';
export * from './setup/types.js';
export * from './setup/projectSetup.js';
