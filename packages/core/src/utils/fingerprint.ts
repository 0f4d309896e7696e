/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import * as fs from 'node:fs/promises';

export type FingerprintMethod = 'sha256' | 'size-mtime';

export interface Fingerprint {
  method: FingerprintMethod;
  value: string;
}

async function sha256File(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

export async function computeFingerprint(
  filePath: string,
  method: FingerprintMethod,
): Promise<Fingerprint> {
  switch (method) {
    case 'sha256':
      return { method, value: await sha256File(filePath) };
    case 'size-mtime': {
      const stats = await fs.stat(filePath);
      return { method, value: `${stats.size}:${Math.trunc(stats.mtimeMs)}` };
    }
    default: {
      const exhaustive: never = method;
      throw new Error(`Unknown fingerprint method: ${String(exhaustive)}`);
    }
  }
}

export function fingerprintsEqual(a: Fingerprint, b: Fingerprint): boolean {
  return a.method === b.method && a.value === b.value;
}
