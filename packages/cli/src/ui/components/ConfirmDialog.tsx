/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type React from 'react';
import { Box, Text } from 'ink';
import { RadioButtonSelect } from './shared/RadioButtonSelect.js';
import { theme } from '../semantic-colors.js';

interface ConfirmDialogProps {
  decisionId: string;
  message: string;
  defaultValue?: boolean;
  onAnswer: (value: boolean) => void;
}

export function ConfirmDialog({
  decisionId,
  message,
  defaultValue = false,
  onAnswer,
}: ConfirmDialogProps): React.JSX.Element {
  const items = [
    { label: 'Yes', value: true, key: 'yes' },
    { label: 'No', value: false, key: 'no' },
  ];

  return (
    <Box
      borderStyle="round"
      borderColor={theme.border.default}
      flexDirection="column"
      paddingX={1}
    >
      <Text bold color={theme.status.warning}>
        {message}
      </Text>
      <Box marginTop={1}>
        <RadioButtonSelect
          items={items}
          initialIndex={defaultValue ? 0 : 1}
          onSelect={onAnswer}
        />
      </Box>
      <Text color={theme.text.secondary}>({decisionId})</Text>
    </Box>
  );
}
