/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { ErrorContext, AbortReason } from '../utils/errors.js';
import type { GitState } from '../git/types.js';
import type { ResourceSnapshot } from '../resources/types.js';
import type { SchemaRecord } from '../mapper/types.js';
import type { Ledger } from '../transfer/types.js';
import type { EnvironmentSnapshot } from '../environment/snapshot.js';

export enum Stage {
  INIT = 'INIT',
  VALIDATE_ENV = 'VALIDATE_ENV',
  RUN_TASK = 'RUN_TASK',
  MAP_METADATA = 'MAP_METADATA',
  TRANSFER_DATA = 'TRANSFER_DATA',
  DONE = 'DONE',
  FAILED = 'FAILED',
  ABORTED = 'ABORTED',
  PARTIAL = 'PARTIAL',
}

export type TerminalStage =
  | Stage.DONE
  | Stage.FAILED
  | Stage.ABORTED
  | Stage.PARTIAL;

export type StageOutcome =
  | 'entered'
  | 'completed'
  | 'skipped'
  | 'failed'
  | 'aborted'
  | 'cleanup';

export interface StageRecord {
  stage: Stage;
  outcome: StageOutcome;
  at: string;
  warning?: string;
  error?: ErrorContext & { kind: string; message: string };
}

export interface Session {
  readonly id: string;
  readonly startedAt: string;
  readonly operator: string;
  readonly subject: string;
  readonly rigId: string;
  readonly directory: string;
  stage: Stage;
  status: TerminalStage | null;
}

export interface SessionResult {
  session: Readonly<Session>;
  finalStage: TerminalStage;
  history: StageRecord[];
  gitState: GitState | null;
  resourceSnapshots: ResourceSnapshot[];
  schemaRecord: SchemaRecord | null;
  ledger: Ledger | null;
  environment: EnvironmentSnapshot | null;
  error: StageRecord['error'] | null;
  abortReason: AbortReason | null;
  manifestPath: string;
}
