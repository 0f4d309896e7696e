/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type React from 'react';
import { useState } from 'react';
import { Box, Text, useInput } from 'ink';
import type { TextValidator } from '@experiment-launcher/core';
import { theme } from '../semantic-colors.js';

interface TextInputDialogProps {
  decisionId: string;
  message: string;
  placeholder?: string;
  validate?: TextValidator;
  onSubmit: (value: string) => void;
}

/** Single-line prompt that keeps asking until `validate` accepts the value. */
export function TextInputDialog({
  decisionId,
  message,
  placeholder,
  validate,
  onSubmit,
}: TextInputDialogProps): React.JSX.Element {
  const [value, setValue] = useState('');
  const [error, setError] = useState<string | null>(null);

  useInput((input, key) => {
    if (key.return) {
      const answer = value.trim();
      const problem = answer === '' ? 'a value is required' : (validate?.(answer) ?? null);
      if (problem) {
        setError(problem);
        return;
      }
      setError(null);
      onSubmit(answer);
      return;
    }
    if (key.backspace || key.delete) {
      setValue((current) => current.slice(0, -1));
      return;
    }
    if (key.ctrl || key.meta || key.escape || key.tab) {
      return;
    }
    if (input) {
      setValue((current) => current + input);
      setError(null);
    }
  });

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
        <Text color={theme.status.success}>{'> '}</Text>
        {value ? (
          <Text color={theme.text.primary}>{value}</Text>
        ) : (
          <Text color={theme.text.secondary}>{placeholder ?? ''}</Text>
        )}
      </Box>
      {error && <Text color={theme.status.error}>Invalid value: {error}</Text>}
      <Text color={theme.text.secondary}>({decisionId})</Text>
    </Box>
  );
}
