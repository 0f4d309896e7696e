/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as os from 'node:os';

export interface EnvironmentSnapshot {
  nodeVersion: string;
  platform: NodeJS.Platform;
  arch: string;
  hostname: string;
  user: string;
  launcherVersion: string;
  capturedAt: string;
}

function currentUser(): string {
  try {
    return os.userInfo().username;
  } catch {
    // userInfo throws when the uid has no passwd entry (some containers).
    return process.env['USER'] ?? process.env['USERNAME'] ?? 'unknown';
  }
}

export function captureEnvironment(
  launcherVersion: string,
  now: Date = new Date(),
): EnvironmentSnapshot {
  return {
    nodeVersion: process.version,
    platform: process.platform,
    arch: process.arch,
    hostname: os.hostname(),
    user: currentUser(),
    launcherVersion,
    capturedAt: now.toISOString(),
  };
}
