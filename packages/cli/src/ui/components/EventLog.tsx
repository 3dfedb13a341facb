/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Box, Text } from 'ink';
import type React from 'react';
import { Colors } from '../colors.js';
import type { LogEntry } from '../types.js';

const MARKERS = {
  info: { symbol: '•', color: Colors.Foreground },
  success: { symbol: '✓', color: Colors.AccentGreen },
  warning: { symbol: '⚠', color: Colors.AccentYellow },
} as const;

interface EventLogProps {
  entries: LogEntry[];
}

function TrialAccounts({
  entry,
}: {
  entry: Extract<LogEntry, { type: 'trial-accounts' }>;
}): React.JSX.Element {
  return (
    <Box flexDirection="column" marginLeft={2}>
      <Text>Found trial billing accounts:</Text>
      {entry.candidates.map((account, index) => (
        <Box key={`${account.id}-${index}`} flexDirection="column" marginLeft={2}>
          <Text>
            <Text color={Colors.AccentGreen}>[{index + 1}]</Text>{' '}
            {account.displayName}
          </Text>
          <Text color={Colors.Gray}>    ID: {account.id}</Text>
        </Box>
      ))}
      <Text color={Colors.AccentGreen}>✓ Trial billing account found!</Text>
      <Text>
        {'  '}Name: <Text color={Colors.AccentGreen}>{entry.selected.displayName}</Text>
      </Text>
      <Text>
        {'  '}ID:{'   '}
        <Text color={Colors.AccentGreen}>{entry.selected.id}</Text>
      </Text>
    </Box>
  );
}

export function EventLog({ entries }: EventLogProps): React.JSX.Element {
  return (
    <Box flexDirection="column">
      {entries.map((entry) => {
        switch (entry.type) {
          case 'step':
            return (
              <Box key={entry.id} marginTop={entry.id === 0 ? 0 : 1}>
                <Text bold color={Colors.AccentYellow}>
                  {entry.title}
                </Text>
              </Box>
            );
          case 'trial-accounts':
            return <TrialAccounts key={entry.id} entry={entry} />;
          default: {
            const marker = MARKERS[entry.type];
            return (
              <Box key={entry.id} marginLeft={2}>
                <Text color={marker.color}>{marker.symbol} </Text>
                <Text>{entry.message}</Text>
              </Box>
            );
          }
        }
      })}
    </Box>
  );
}
