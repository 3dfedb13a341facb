/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { render } from 'ink';
import {
  EXIT_CANCELLED,
  GcloudClient,
  getErrorMessage,
  getExitCode,
  loadSetupConfig,
  ProjectSetup,
  type SetupConfig,
} from '@workshop-setup/core';
import { SetupApp } from './ui/SetupApp.js';
import type { SetupRunner } from './ui/types.js';
import { readProjectIdLine } from './utils/readProjectIdLine.js';

export function createSetupRunner(config: SetupConfig): SetupRunner {
  const gcloud = new GcloudClient({
    executable: config.gcloudPath,
    debug: config.debug,
  });
  return ({ promptProjectId, onEvent }) =>
    new ProjectSetup({ config, gcloud, promptProjectId, onEvent }).run();
}

/**
 * Renders the setup flow and resolves with the process exit code.
 */
export async function main(): Promise<number> {
  let config: SetupConfig;
  try {
    config = loadSetupConfig();
  } catch (error) {
    console.error(getErrorMessage(error));
    return getExitCode(error);
  }

  // Stays at EXIT_CANCELLED when Ctrl+C unmounts the app mid-flow.
  let exitCode = EXIT_CANCELLED;
  const { waitUntilExit } = render(
    <SetupApp
      runSetup={createSetupRunner(config)}
      envKey={config.projectEnvKey}
      onExit={(code) => {
        exitCode = code;
      }}
      readProjectId={readProjectIdLine}
    />,
  );
  await waitUntilExit();
  return exitCode;
}
