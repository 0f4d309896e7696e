/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type React from 'react';
import { useState } from 'react';
import { Box, Text, useInput } from 'ink';
import { theme } from '../../semantic-colors.js';

export interface RadioSelectItem<T> {
  label: string;
  value: T;
  key: string;
  description?: string;
}

export interface RadioButtonSelectProps<T> {
  items: Array<RadioSelectItem<T>>;
  initialIndex?: number;
  onSelect: (value: T) => void;
  isFocused?: boolean;
  /** Number keys 1-9 select an item directly. */
  showNumbers?: boolean;
}

export function RadioButtonSelect<T>({
  items,
  initialIndex = 0,
  onSelect,
  isFocused = true,
  showNumbers = true,
}: RadioButtonSelectProps<T>): React.JSX.Element {
  const [activeIndex, setActiveIndex] = useState(
    Math.min(Math.max(initialIndex, 0), Math.max(items.length - 1, 0)),
  );

  useInput(
    (input, key) => {
      if (items.length === 0) {
        return;
      }
      if (key.upArrow || input === 'k') {
        setActiveIndex((index) => (index - 1 + items.length) % items.length);
        return;
      }
      if (key.downArrow || input === 'j') {
        setActiveIndex((index) => (index + 1) % items.length);
        return;
      }
      if (key.return) {
        const item = items[activeIndex];
        if (item) {
          onSelect(item.value);
        }
        return;
      }
      if (showNumbers && /^[1-9]$/.test(input)) {
        const item = items[Number(input) - 1];
        if (item) {
          setActiveIndex(Number(input) - 1);
          onSelect(item.value);
        }
      }
    },
    { isActive: isFocused },
  );

  return (
    <Box flexDirection="column">
      {items.map((item, index) => {
        const isActive = index === activeIndex;
        const color = isActive ? theme.status.success : theme.text.primary;
        return (
          <Box key={item.key} flexDirection="column">
            <Box>
              <Text color={color}>{isActive ? '● ' : '○ '}</Text>
              {showNumbers && (
                <Text color={theme.text.secondary}>{`${index + 1}. `}</Text>
              )}
              <Text color={color}>{item.label}</Text>
            </Box>
            {item.description && (
              <Box marginLeft={showNumbers ? 5 : 2}>
                <Text color={theme.text.secondary}>{item.description}</Text>
              </Box>
            )}
          </Box>
        );
      })}
    </Box>
  );
}
