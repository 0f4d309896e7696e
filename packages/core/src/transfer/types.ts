/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Fingerprint, FingerprintMethod } from '../utils/fingerprint.js';
import type { SchemaRecord } from '../mapper/types.js';

export enum TransferJobState {
  PENDING = 'PENDING',
  IN_FLIGHT = 'IN_FLIGHT',
  CONFIRMED = 'CONFIRMED',
  FAILED = 'FAILED',
}

export interface TransferJob {
  /** Path relative to the session directory; unique within a ledger. */
  id: string;
  sourcePath: string;
  destinationPath: string;
  fingerprint: Fingerprint;
  state: TransferJobState;
  retryCount: number;
  attempts: number;
  lastError: string | null;
  /** Set once automatic retries are over; only manual recovery re-queues it. */
  permanent: boolean;
}

export type NotificationState = 'PENDING' | 'SENT' | 'FAILED' | 'SKIPPED';

export interface NotificationOutcome {
  state: NotificationState;
  attempts: number;
  lastError: string | null;
  receipt: string | null;
  at: string | null;
}

/**
 * A frozen copy of a session file that keeps changing while the session
 * runs, such as the log or the manifest. Taken again on every pass.
 */
export interface SessionRecordCopy {
  name: string;
  destinationPath: string;
  state: 'COPIED' | 'FAILED';
  bytes: number;
  lastError: string | null;
  at: string;
}

export interface Ledger {
  ledgerVersion: number;
  sessionId: string;
  sourceRoot: string;
  destination: string;
  fingerprintMethod: FingerprintMethod;
  jobs: TransferJob[];
  notification: NotificationOutcome;
  records: SessionRecordCopy[];
  updatedAt: string;
}

export interface Credentials {
  principal: string;
  secret?: string;
}

export interface CredentialProvider {
  getCredentials(): Promise<Credentials>;
}

export interface TransferNotification {
  sessionId: string;
  destination: string;
  jobs: Array<Pick<TransferJob, 'id' | 'destinationPath' | 'fingerprint' | 'state'>>;
  schemaRecord: SchemaRecord | null;
}

export interface NotificationReceipt {
  receipt: string;
}

/** Notifies the downstream service that a session's data has landed. */
export interface TransferBackend {
  readonly name: string;
  notify(
    notification: TransferNotification,
    credentials: Credentials | null,
  ): Promise<NotificationReceipt>;
}
