/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'node:path';
import { Box, Text } from 'ink';
import type React from 'react';
import type { SetupResult } from '@workshop-setup/core';
import { Colors } from '../colors.js';
import { LeftBorderPanel } from './shared/LeftBorderPanel.js';

interface SetupSummaryProps {
  result: SetupResult;
  /** Key holding the project id in the environment file. */
  envKey: string;
}

function Row({ label, value }: { label: string; value: string }) {
  return (
    <Text>
      {label.padEnd(17)}
      <Text color={Colors.AccentGreen}>{value}</Text>
    </Text>
  );
}

export const SetupSummary: React.FC<SetupSummaryProps> = ({
  result,
  envKey,
}) => {
  const envName = path.basename(result.envFile);
  const alreadyConfigured = result.status === 'already-configured';

  return (
    <LeftBorderPanel accentColor={Colors.AccentGreen} marginTop={1}>
      <Text bold color={Colors.AccentGreen}>
        {alreadyConfigured ? 'Project Already Set Up! ✓' : 'Setup Complete! 🎉'}
      </Text>
      <Box flexDirection="column" marginY={1}>
        <Row label="Project ID:" value={result.projectId} />
        <Row label="Billing Account:" value={result.billingAccountId} />
        {!alreadyConfigured && <Row label="Environment:" value={envName} />}
      </Box>
      {alreadyConfigured ? (
        <>
          <Text>Your environment is ready. No action needed!</Text>
          <Text color={Colors.Gray}>
            To use a different project, remove {envKey} from {envName} and run
            this setup again.
          </Text>
        </>
      ) : (
        <>
          <Text>You can now proceed with the workshop!</Text>
          <Text>
            To verify, run:{' '}
            <Text color={Colors.AccentYellow}>gcloud config get-value project</Text>
          </Text>
        </>
      )}
    </LeftBorderPanel>
  );
};
