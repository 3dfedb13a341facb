/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Box } from 'ink';
import type { ComponentProps, ReactNode } from 'react';
import { Colors } from '../../colors.js';

type BoxProps = ComponentProps<typeof Box>;

/**
 * A column of content behind a single coloured rule on its left edge.
 */
export interface LeftBorderPanelProps
  extends Omit<BoxProps, 'children' | 'borderStyle' | 'borderColor'> {
  children: ReactNode;
  /** Color for the left border rule. Defaults to a neutral gray tone. */
  accentColor?: string;
}

export function LeftBorderPanel({
  children,
  accentColor = Colors.Gray,
  ...boxProps
}: LeftBorderPanelProps) {
  return (
    <Box
      flexDirection="column"
      borderStyle="bold"
      borderColor={accentColor}
      borderTop={false}
      borderRight={false}
      borderBottom={false}
      paddingLeft={1}
      {...boxProps}
    >
      {children}
    </Box>
  );
}
