/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { useEffect } from 'react';
import type React from 'react';
import { Box, Text, useApp, useStdin } from 'ink';
import Spinner from 'ink-spinner';
import {
  EXIT_SUCCESS,
  getExitCode,
  type ProjectIdPrompter,
} from '@workshop-setup/core';
import { Colors } from './colors.js';
import { Header } from './components/Header.js';
import { EventLog } from './components/EventLog.js';
import { ProjectIdPrompt } from './components/ProjectIdPrompt.js';
import { SetupSummary } from './components/SetupSummary.js';
import { SetupErrorPanel } from './components/SetupErrorPanel.js';
import { useProjectSetup } from './hooks/useProjectSetup.js';
import type { SetupRunner } from './types.js';

interface SetupAppProps {
  runSetup: SetupRunner;
  /** Key holding the project id in the environment file. */
  envKey: string;
  /** Called once with the process exit code before the app unmounts. */
  onExit: (exitCode: number) => void;
  /** Reads the project id when stdin cannot be put into raw mode. */
  readProjectId?: ProjectIdPrompter;
}

export const SetupApp = ({
  runSetup,
  envKey,
  onExit,
  readProjectId,
}: SetupAppProps): React.JSX.Element => {
  const { exit } = useApp();
  const { isRawModeSupported } = useStdin();
  const { entries, phase, currentStep, submitProjectId, cancelPrompt } =
    useProjectSetup(runSetup, isRawModeSupported ? undefined : readProjectId);

  useEffect(() => {
    if (phase.kind === 'done') {
      onExit(EXIT_SUCCESS);
      exit();
    } else if (phase.kind === 'failed') {
      onExit(getExitCode(phase.error));
      exit();
    }
  }, [phase, onExit, exit]);

  return (
    <Box flexDirection="column">
      <Header />
      <EventLog entries={entries} />
      {phase.kind === 'running' && currentStep && (
        <Box marginLeft={2}>
          <Text color={Colors.AccentCyan}>
            <Spinner type="dots" />
          </Text>
          <Text color={Colors.Gray}> {currentStep}...</Text>
        </Box>
      )}
      {phase.kind === 'prompt' && (
        <ProjectIdPrompt
          suggestedId={phase.suggestedId}
          onSubmit={submitProjectId}
          onCancel={cancelPrompt}
        />
      )}
      {phase.kind === 'done' && (
        <SetupSummary result={phase.result} envKey={envKey} />
      )}
      {phase.kind === 'failed' && <SetupErrorPanel error={phase.error} />}
    </Box>
  );
};
