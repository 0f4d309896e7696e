/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type React from 'react';
import { Box, Text } from 'ink';
import type { PickOption } from '@experiment-launcher/core';
import { RadioButtonSelect } from './shared/RadioButtonSelect.js';
import { theme } from '../semantic-colors.js';

interface PickOneDialogProps<T> {
  decisionId: string;
  message: string;
  options: ReadonlyArray<PickOption<T>>;
  onSelect: (option: PickOption<T>) => void;
}

export function PickOneDialog<T>({
  decisionId,
  message,
  options,
  onSelect,
}: PickOneDialogProps<T>): React.JSX.Element {
  const items = options.map((option) => ({
    label: option.label,
    value: option,
    key: option.key,
    description: option.description,
  }));

  return (
    <Box
      borderStyle="round"
      borderColor={theme.border.default}
      flexDirection="column"
      paddingX={1}
    >
      <Text bold color={theme.text.accent}>
        {message}
      </Text>
      <Box marginTop={1}>
        <RadioButtonSelect items={items} onSelect={onSelect} />
      </Box>
      <Text color={theme.text.secondary}>({decisionId})</Text>
    </Box>
  );
}
