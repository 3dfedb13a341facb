/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type React from 'react';
import { useRef, useState } from 'react';
import { Box, Text, useInput } from 'ink';
import { isValidProjectId } from '@workshop-setup/core';
import { Colors } from '../colors.js';
import { LeftBorderPanel } from './shared/LeftBorderPanel.js';

export const PROJECT_ID_HINT =
  'Use 6-30 lowercase letters, digits or hyphens, starting with a letter and not ending with a hyphen.';

interface ProjectIdPromptProps {
  suggestedId: string;
  onSubmit: (answer: string) => void;
  onCancel: () => void;
}

/**
 * Strips terminal escape sequences, bracketed-paste markers and control
 * characters from a chunk of typed or pasted input.
 */
export function cleanInput(input: string): string {
  return input
    .replace(/\u001b\[[0-9;]*[a-zA-Z]/g, '') // eslint-disable-line no-control-regex
    .replace(/\[20[01]~/g, '')
    .split('')
    .filter((ch) => {
      const code = ch.charCodeAt(0);
      return code >= 32 && code !== 127;
    })
    .join('');
}

export function ProjectIdPrompt({
  suggestedId,
  onSubmit,
  onCancel,
}: ProjectIdPromptProps): React.JSX.Element {
  const [value, setValue] = useState('');
  const valueRef = useRef(value);

  const update = (next: string) => {
    valueRef.current = next;
    setValue(next);
  };

  useInput((input, key) => {
    if (key.escape) {
      onCancel();
      return;
    }

    if (key.return) {
      onSubmit(valueRef.current);
      return;
    }

    if (key.backspace || key.delete) {
      update(valueRef.current.slice(0, -1));
      return;
    }

    const cleaned = cleanInput(input);
    if (cleaned.length > 0) {
      update(`${valueRef.current}${cleaned}`);
    }
  });

  const typed = value.trim();
  const showHint = typed.length > 0 && !isValidProjectId(typed);

  return (
    <LeftBorderPanel accentColor={Colors.AccentYellow} marginTop={1}>
      <Text>
        Suggested project ID: <Text color={Colors.AccentGreen}>{suggestedId}</Text>
      </Text>
      <Box>
        <Text>Enter project ID (press Enter for suggested): </Text>
        <Text color={Colors.AccentCyan}>{value}</Text>
        <Text inverse> </Text>
      </Box>
      {showHint && (
        <Text color={Colors.AccentYellow}>
          Not a valid project ID yet. {PROJECT_ID_HINT}
        </Text>
      )}
      <Text color={Colors.Gray}>Press Enter to submit or Esc to cancel</Text>
    </LeftBorderPanel>
  );
}
