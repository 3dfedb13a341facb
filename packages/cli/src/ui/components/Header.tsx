/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Box, Text } from 'ink';
import type React from 'react';
import { Colors } from '../colors.js';

export const HEADER_TITLE = 'Google Cloud Workshop - Project Setup';

export const Header: React.FC = () => (
  <Box
    borderStyle="double"
    borderColor={Colors.AccentBlue}
    paddingX={2}
    marginBottom={1}
    alignSelf="flex-start"
  >
    <Text bold color={Colors.AccentBlue}>
      {HEADER_TITLE}
    </Text>
  </Box>
);
