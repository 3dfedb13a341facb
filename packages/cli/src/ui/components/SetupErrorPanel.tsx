/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Box, Text } from 'ink';
import type React from 'react';
import {
  getErrorMessage,
  NoTrialAccountError,
  SetupError,
} from '@workshop-setup/core';
import { Colors } from '../colors.js';
import { LeftBorderPanel } from './shared/LeftBorderPanel.js';

interface SetupErrorPanelProps {
  error: unknown;
}

export const SetupErrorPanel: React.FC<SetupErrorPanelProps> = ({ error }) => {
  const setupError = error instanceof SetupError ? error : undefined;

  return (
    <LeftBorderPanel accentColor={Colors.AccentRed} marginTop={1}>
      <Text bold color={Colors.AccentRed}>
        ERROR: {getErrorMessage(error)}
      </Text>
      {setupError?.detail && (
        <Text color={Colors.Gray}>{setupError.detail}</Text>
      )}
      {setupError && setupError.hints.length > 0 && (
        <Box flexDirection="column" marginTop={1}>
          {setupError.hints.map((hint) => (
            <Text key={hint}>  - {hint}</Text>
          ))}
        </Box>
      )}
      {error instanceof NoTrialAccountError && (
        <Box flexDirection="column" marginTop={1}>
          <Text>Your current billing accounts:</Text>
          {error.accounts.map((account) => (
            <Text key={account.id}>
              {'  '}
              {account.displayName} ({account.id}) OPEN:{' '}
              <Text color={account.open ? Colors.AccentGreen : Colors.AccentRed}>
                {account.open ? 'True' : 'False'}
              </Text>
            </Text>
          ))}
        </Box>
      )}
    </LeftBorderPanel>
  );
};
