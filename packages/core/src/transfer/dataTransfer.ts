/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { debugLogger } from '../utils/debugLogger.js';
import {
  abortErrorFromSignal,
  AbortError,
  getErrorMessage,
  isNodeError,
  TransferError,
} from '../utils/errors.js';
import { computeFingerprint, fingerprintsEqual } from '../utils/fingerprint.js';
import { retryWithBackoff, type RetryOptions } from '../utils/retry.js';
import { Stage } from '../session/types.js';
import type { SchemaRecord } from '../mapper/types.js';
import { isTransientFailure, toTransferError } from './classify.js';
import type { LedgerStore } from './ledger.js';
import {
  TransferJobState,
  type CredentialProvider,
  type Ledger,
  type SessionRecordCopy,
  type TransferBackend,
  type TransferJob,
} from './types.js';

export type FileCopier = (
  sourcePath: string,
  destinationPath: string,
) => Promise<void>;

/** Copies a file and carries the source timestamps over to the copy. */
export const copyPreservingTimes: FileCopier = async (
  sourcePath,
  destinationPath,
) => {
  await fs.mkdir(path.dirname(destinationPath), { recursive: true });
  await fs.copyFile(sourcePath, destinationPath);
  const stats = await fs.stat(sourcePath);
  await fs.utimes(destinationPath, stats.atime, stats.mtime);
};

export type TransferRetryPolicy = Pick<
  RetryOptions,
  'maxAttempts' | 'initialDelayMs' | 'maxDelayMs' | 'jitter'
>;

export interface DataTransferOptions {
  workers: number;
  retry: TransferRetryPolicy;
  store?: LedgerStore;
  backend?: TransferBackend;
  credentialProvider?: CredentialProvider;
  copyFile?: FileCopier;
  signal?: AbortSignal;
  /** Included in the notification so downstream can index the session. */
  schemaRecord?: SchemaRecord | null;
  /**
   * Live session files copied as snapshots once the data jobs settle,
   * before the notification. Missing files are skipped.
   */
  records?: string[];
}

export interface LedgerSummary {
  total: number;
  confirmed: number;
  failed: number;
  pending: number;
}

export function summarizeLedger(ledger: Ledger): LedgerSummary {
  const count = (state: TransferJobState) =>
    ledger.jobs.filter((job) => job.state === state).length;
  return {
    total: ledger.jobs.length,
    confirmed: count(TransferJobState.CONFIRMED),
    failed: count(TransferJobState.FAILED),
    pending:
      count(TransferJobState.PENDING) + count(TransferJobState.IN_FLIGHT),
  };
}

/** Every copy is confirmed and the notification did not fail. */
export function isLedgerComplete(ledger: Ledger): boolean {
  return (
    ledger.jobs.every((job) => job.state === TransferJobState.CONFIRMED) &&
    ledger.records.every((record) => record.state === 'COPIED') &&
    (ledger.notification.state === 'SENT' ||
      ledger.notification.state === 'SKIPPED')
  );
}

function isRunnable(job: TransferJob): boolean {
  return (
    job.state === TransferJobState.PENDING ||
    (job.state === TransferJobState.FAILED && !job.permanent)
  );
}

export class DataTransfer {
  private readonly copyFile: FileCopier;

  constructor(private readonly options: DataTransferOptions) {
    this.copyFile = options.copyFile ?? copyPreservingTimes;
  }

  /**
   * Mirrors every runnable job into `destination`, then sends one
   * notification for the job set. The ledger is persisted after every job
   * state change and returned with the final states.
   */
  async transfer(
    ledger: Ledger,
    destination: string = ledger.destination,
  ): Promise<Ledger> {
    await this.prepareDestination(destination);
    if (destination !== ledger.destination) {
      for (const job of ledger.jobs) {
        if (job.state !== TransferJobState.CONFIRMED) {
          job.destinationPath = path.join(destination, ...job.id.split('/'));
        }
      }
      ledger.destination = destination;
    }

    const queue = ledger.jobs.filter(isRunnable);
    const workerCount = Math.max(1, Math.min(this.options.workers, queue.length));
    debugLogger.log(
      `[transfer] ${queue.length} of ${ledger.jobs.length} file(s) to copy with ${workerCount} worker(s)`,
    );

    // A failed ledger save stops every worker from taking new jobs; the
    // first failure is rethrown once the copies in flight have settled.
    let next = 0;
    let halted = false;
    const worker = async () => {
      while (!halted && next < queue.length) {
        const job = queue[next++];
        if (job) {
          await this.runJob(ledger, job);
        }
      }
    };
    const results = await Promise.allSettled(
      Array.from({ length: workerCount }, () =>
        worker().catch((error: unknown) => {
          halted = true;
          throw error;
        }),
      ),
    );
    const failure = results.find(
      (result): result is PromiseRejectedResult => result.status === 'rejected',
    );
    if (failure) {
      throw failure.reason;
    }

    if (this.options.signal?.aborted) {
      await this.persist(ledger);
      return ledger;
    }

    await this.copyRecords(ledger);
    await this.notify(ledger);
    await this.persist(ledger);

    const summary = summarizeLedger(ledger);
    debugLogger.log(
      `[transfer] ${summary.confirmed}/${summary.total} confirmed, ${summary.failed} failed, notification ${ledger.notification.state}`,
    );
    return ledger;
  }

  private async prepareDestination(destination: string): Promise<void> {
    if (destination.trim() === '' || !path.isAbsolute(destination)) {
      throw new TransferError(
        `Invalid transfer destination "${destination}": an absolute path is required.`,
        false,
        { stage: Stage.TRANSFER_DATA, entity: destination },
      );
    }
    try {
      await fs.mkdir(destination, { recursive: true });
    } catch (error) {
      if (isNodeError(error) && error.code === 'EEXIST') {
        throw new TransferError(
          `Invalid transfer destination "${destination}": not a directory.`,
          false,
          { stage: Stage.TRANSFER_DATA, entity: destination, cause: error },
        );
      }
      throw toTransferError(error, destination);
    }
  }

  private async runJob(ledger: Ledger, job: TransferJob): Promise<void> {
    const { signal } = this.options;
    if (signal?.aborted) {
      return;
    }

    job.state = TransferJobState.IN_FLIGHT;
    await this.persist(ledger);

    try {
      await retryWithBackoff(
        async (attempt) => {
          if (signal?.aborted) {
            throw abortErrorFromSignal(signal);
          }
          job.attempts++;
          job.retryCount = attempt - 1;
          try {
            await this.copyAndVerify(ledger, job);
          } catch (error) {
            const transferError = toTransferError(error, job.id);
            job.lastError = transferError.message;
            await this.persist(ledger);
            throw transferError;
          }
        },
        {
          ...this.options.retry,
          shouldRetryOnError: isTransientFailure,
          signal,
        },
      );
      job.state = TransferJobState.CONFIRMED;
      job.lastError = null;
      job.permanent = false;
    } catch (error) {
      if (error instanceof AbortError) {
        job.state = TransferJobState.PENDING;
      } else {
        // Exhausted transient retries are as final as a permanent error.
        job.state = TransferJobState.FAILED;
        job.permanent = true;
        job.lastError = getErrorMessage(error);
        debugLogger.warn(`[transfer] ${job.id} failed: ${job.lastError}`);
      }
    }
    await this.persist(ledger);
  }

  private async copyAndVerify(ledger: Ledger, job: TransferJob): Promise<void> {
    try {
      await fs.access(job.sourcePath);
    } catch (error) {
      throw new TransferError(`Source ${job.sourcePath} is missing.`, false, {
        stage: Stage.TRANSFER_DATA,
        entity: job.id,
        cause: error,
      });
    }
    await this.copyFile(job.sourcePath, job.destinationPath);
    const copied = await computeFingerprint(
      job.destinationPath,
      ledger.fingerprintMethod,
    );
    if (!fingerprintsEqual(copied, job.fingerprint)) {
      throw new TransferError(
        `Checksum mismatch for ${job.id}: expected ${job.fingerprint.value}, got ${copied.value}.`,
        false,
        { stage: Stage.TRANSFER_DATA, entity: job.id },
      );
    }
  }

  private async copyRecords(ledger: Ledger): Promise<void> {
    const copies: SessionRecordCopy[] = [];
    for (const sourcePath of this.options.records ?? []) {
      const name = path.basename(sourcePath);
      const destinationPath = path.join(ledger.destination, name);
      let content: Buffer;
      try {
        content = await fs.readFile(sourcePath);
      } catch (error) {
        if (isNodeError(error) && error.code === 'ENOENT') {
          continue;
        }
        throw error;
      }

      try {
        await retryWithBackoff(
          async () => {
            try {
              await fs.writeFile(destinationPath, content);
              const written = await fs.readFile(destinationPath);
              if (!written.equals(content)) {
                throw new TransferError(
                  `Snapshot of ${name} does not match what was written.`,
                  false,
                  { stage: Stage.TRANSFER_DATA, entity: name },
                );
              }
            } catch (error) {
              throw toTransferError(error, name);
            }
          },
          {
            ...this.options.retry,
            shouldRetryOnError: isTransientFailure,
            signal: this.options.signal,
          },
        );
        copies.push({
          name,
          destinationPath,
          state: 'COPIED',
          bytes: content.length,
          lastError: null,
          at: new Date().toISOString(),
        });
      } catch (error) {
        if (error instanceof AbortError) {
          return;
        }
        debugLogger.warn(
          `[transfer] Snapshot of ${name} failed: ${getErrorMessage(error)}`,
        );
        copies.push({
          name,
          destinationPath,
          state: 'FAILED',
          bytes: content.length,
          lastError: getErrorMessage(error),
          at: new Date().toISOString(),
        });
      }
    }
    ledger.records = copies;
  }

  private async notify(ledger: Ledger): Promise<void> {
    const { backend, credentialProvider } = this.options;
    if (ledger.notification.state === 'SENT') {
      return;
    }
    if (!backend) {
      ledger.notification = {
        ...ledger.notification,
        state: 'SKIPPED',
        lastError: null,
        at: new Date().toISOString(),
      };
      return;
    }
    const unconfirmed =
      ledger.jobs.filter((job) => job.state !== TransferJobState.CONFIRMED)
        .length +
      ledger.records.filter((record) => record.state !== 'COPIED').length;
    if (unconfirmed > 0) {
      ledger.notification = {
        ...ledger.notification,
        state: 'FAILED',
        lastError: `${unconfirmed} file(s) not confirmed; ${backend.name} was not notified.`,
        at: new Date().toISOString(),
      };
      return;
    }

    try {
      const { receipt } = await retryWithBackoff(
        async (attempt) => {
          ledger.notification.attempts = attempt;
          try {
            const credentials = credentialProvider
              ? await credentialProvider.getCredentials()
              : null;
            return await backend.notify(
              {
                sessionId: ledger.sessionId,
                destination: ledger.destination,
                jobs: ledger.jobs.map(({ id, destinationPath, fingerprint, state }) => ({
                  id,
                  destinationPath,
                  fingerprint,
                  state,
                })),
                schemaRecord: this.options.schemaRecord ?? null,
              },
              credentials,
            );
          } catch (error) {
            const transferError = toTransferError(error, backend.name);
            ledger.notification.lastError = transferError.message;
            throw transferError;
          }
        },
        {
          ...this.options.retry,
          shouldRetryOnError: isTransientFailure,
          signal: this.options.signal,
        },
      );
      ledger.notification = {
        state: 'SENT',
        attempts: ledger.notification.attempts,
        lastError: null,
        receipt,
        at: new Date().toISOString(),
      };
    } catch (error) {
      if (error instanceof AbortError) {
        ledger.notification.state = 'PENDING';
        return;
      }
      ledger.notification = {
        ...ledger.notification,
        state: 'FAILED',
        lastError: getErrorMessage(error),
        at: new Date().toISOString(),
      };
      debugLogger.warn(
        `[transfer] Notification to ${backend.name} failed: ${getErrorMessage(error)}`,
      );
    }
  }

  private async persist(ledger: Ledger): Promise<void> {
    await this.options.store?.save(ledger);
  }
}
