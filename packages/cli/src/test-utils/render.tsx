/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export { render } from 'ink-testing-library';

/** Lets ink process input written to stdin before the next assertion. */
export const waitForInput = () =>
  new Promise<void>((resolve) => setTimeout(resolve, 100));
