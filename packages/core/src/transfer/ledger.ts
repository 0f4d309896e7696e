/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { readJsonFile, SerialFileWriter } from '../utils/atomicFile.js';
import { debugLogger } from '../utils/debugLogger.js';
import { isNodeError } from '../utils/errors.js';
import {
  computeFingerprint,
  fingerprintsEqual,
  type Fingerprint,
  type FingerprintMethod,
} from '../utils/fingerprint.js';
import { MANIFEST_FILENAME } from '../session/manifest.js';
import {
  TransferJobState,
  type Ledger,
  type NotificationOutcome,
  type TransferJob,
} from './types.js';

export const LEDGER_FILENAME = 'transfer.ledger.json';
export const LEDGER_VERSION = 1;
export const SESSION_LOG_FILENAME = 'launcher.log';

/**
 * Files that change while a transfer runs. The log and the manifest reach
 * the destination as record snapshots instead of jobs.
 */
const EXCLUDED_NAMES: ReadonlySet<string> = new Set([
  LEDGER_FILENAME,
  MANIFEST_FILENAME,
  SESSION_LOG_FILENAME,
]);

function isExcluded(name: string): boolean {
  return (
    EXCLUDED_NAMES.has(name) || name.endsWith('.tmp') || name.endsWith('.lock')
  );
}

async function listFiles(root: string, relative = ''): Promise<string[]> {
  const entries = await fs.readdir(path.join(root, relative), {
    withFileTypes: true,
  });
  const files: string[] = [];
  for (const entry of entries) {
    const child = relative === '' ? entry.name : path.join(relative, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(root, child)));
    } else if (entry.isFile() && !isExcluded(entry.name)) {
      files.push(child);
    }
  }
  return files;
}

export function pendingNotification(): NotificationOutcome {
  return {
    state: 'PENDING',
    attempts: 0,
    lastError: null,
    receipt: null,
    at: null,
  };
}

/** Enumerates `sourceDir` into PENDING jobs, sorted by relative path. */
export async function buildLedger(
  sessionId: string,
  sourceDir: string,
  destination: string,
  method: FingerprintMethod,
): Promise<Ledger> {
  const files = (await listFiles(sourceDir)).sort();
  const jobs: TransferJob[] = [];
  for (const relative of files) {
    const sourcePath = path.join(sourceDir, relative);
    jobs.push({
      id: relative.split(path.sep).join('/'),
      sourcePath,
      destinationPath: path.join(destination, relative),
      fingerprint: await computeFingerprint(sourcePath, method),
      state: TransferJobState.PENDING,
      retryCount: 0,
      attempts: 0,
      lastError: null,
      permanent: false,
    });
  }
  debugLogger.debug(`[transfer] Ledger built with ${jobs.length} job(s)`);
  return {
    ledgerVersion: LEDGER_VERSION,
    sessionId,
    sourceRoot: sourceDir,
    destination,
    fingerprintMethod: method,
    jobs,
    notification: pendingNotification(),
    records: [],
    updatedAt: new Date().toISOString(),
  };
}

export class LedgerStore {
  private readonly writer: SerialFileWriter;

  constructor(readonly filePath: string) {
    this.writer = new SerialFileWriter(filePath);
  }

  static forSession(sessionDirectory: string): LedgerStore {
    return new LedgerStore(path.join(sessionDirectory, LEDGER_FILENAME));
  }

  save(ledger: Ledger): Promise<void> {
    ledger.updatedAt = new Date().toISOString();
    return this.writer.write(ledger);
  }

  flush(): Promise<void> {
    return this.writer.flush();
  }

  async load(): Promise<Ledger | null> {
    const raw = await readJsonFile(this.filePath);
    if (raw === null) {
      return null;
    }
    if (!isLedger(raw)) {
      throw new Error(`${this.filePath} is not a transfer ledger.`);
    }
    return raw;
  }
}

function isLedger(value: unknown): value is Ledger {
  return (
    typeof value === 'object' &&
    value !== null &&
    'ledgerVersion' in value &&
    value.ledgerVersion === LEDGER_VERSION &&
    'jobs' in value &&
    Array.isArray(value.jobs) &&
    'notification' in value &&
    'records' in value &&
    Array.isArray(value.records)
  );
}

export interface ReconcileOptions {
  /** Also re-queue jobs that failed permanently (manual recovery). */
  retryFailed?: boolean;
}

export interface ReconcileResult {
  ledger: Ledger;
  /** Ids of CONFIRMED jobs whose source changed since they were copied. */
  changed: string[];
  /** Ids of jobs re-queued for another attempt. */
  requeued: string[];
}

function requeue(job: TransferJob): void {
  job.state = TransferJobState.PENDING;
  job.retryCount = 0;
  job.attempts = 0;
  job.permanent = false;
  job.lastError = null;
}

/**
 * Prepares a persisted ledger for another transfer pass. Source
 * fingerprints are recomputed; CONFIRMED jobs stay confirmed unless their
 * source changed.
 */
export async function reconcileLedger(
  ledger: Ledger,
  options: ReconcileOptions = {},
): Promise<ReconcileResult> {
  const changed: string[] = [];
  const requeued: string[] = [];

  for (const job of ledger.jobs) {
    let current: Fingerprint;
    try {
      current = await computeFingerprint(job.sourcePath, ledger.fingerprintMethod);
    } catch (error) {
      if (!isNodeError(error) || error.code !== 'ENOENT') {
        throw error;
      }
      if (job.state !== TransferJobState.CONFIRMED) {
        job.state = TransferJobState.FAILED;
        job.permanent = true;
        job.lastError = `Source ${job.sourcePath} no longer exists.`;
      }
      continue;
    }

    const sourceChanged = !fingerprintsEqual(current, job.fingerprint);
    job.fingerprint = current;

    switch (job.state) {
      case TransferJobState.CONFIRMED:
        if (sourceChanged) {
          changed.push(job.id);
          requeue(job);
          requeued.push(job.id);
        }
        break;
      case TransferJobState.IN_FLIGHT:
        requeue(job);
        requeued.push(job.id);
        break;
      case TransferJobState.FAILED:
        if (!job.permanent || options.retryFailed) {
          requeue(job);
          requeued.push(job.id);
        }
        break;
      case TransferJobState.PENDING:
        break;
      default: {
        const exhaustive: never = job.state;
        throw new Error(`Unknown job state: ${String(exhaustive)}`);
      }
    }
  }

  if (requeued.length > 0 || ledger.notification.state === 'FAILED') {
    ledger.notification = pendingNotification();
  }

  if (changed.length > 0) {
    debugLogger.warn(
      `[transfer] ${changed.length} confirmed file(s) changed since copy: ${changed.join(', ')}`,
    );
  }
  return { ledger, changed, requeued };
}
