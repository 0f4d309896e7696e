/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Box, Text } from 'ink';
import Gradient from 'ink-gradient';
import { theme } from '../semantic-colors.js';

interface BannerProps {
  title: string;
  /** Facts shown under the title, joined with a middle dot. */
  details: string[];
}

export const Banner = ({ title, details }: BannerProps) => {
  const gradient = theme.ui.gradient;
  return (
    <Box
      flexDirection="column"
      borderStyle="round"
      borderColor={theme.border.default}
      paddingX={1}
      marginTop={1}
    >
      {gradient && gradient.length > 1 ? (
        <Gradient colors={gradient}>
          <Text bold>{title}</Text>
        </Gradient>
      ) : (
        <Text bold color={theme.status.success}>
          {title}
        </Text>
      )}
      {details.length > 0 && (
        <Text color={theme.text.secondary}>{details.join(' · ')}</Text>
      )}
    </Box>
  );
};
