/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';

/** Reads the CLI version from package.json; the path holds from src/ and dist/. */
export function getCliVersion(): string {
  const packageJson: unknown = JSON.parse(
    fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'),
  );
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return 'unknown';
}
