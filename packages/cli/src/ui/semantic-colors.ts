/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export interface SemanticColors {
  text: {
    primary: string;
    secondary: string;
    accent: string;
  };
  status: {
    success: string;
    warning: string;
    error: string;
  };
  border: {
    default: string;
  };
  ui: {
    gradient: string[] | undefined;
  };
}

export const theme: SemanticColors = {
  text: {
    primary: 'white',
    secondary: 'gray',
    accent: 'cyan',
  },
  status: {
    success: 'green',
    warning: 'yellow',
    error: 'red',
  },
  border: {
    default: 'gray',
  },
  ui: {
    gradient: ['#4796E4', '#847ACE', '#C3677F'],
  },
};
