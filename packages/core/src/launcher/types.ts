/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { RunConfig, TaskProfile } from '../config/config.js';
import type { EnvironmentSnapshot } from '../environment/snapshot.js';
import type { GitManager } from '../git/gitManager.js';
import type { GitState } from '../git/types.js';
import type { SchemaMapper, SchemaRecord } from '../mapper/types.js';
import type { Picker } from '../picker/types.js';
import type { ResourceMonitor, ResourceWatch } from '../resources/resourceMonitor.js';
import type { ResourceProbe, ResourceSnapshot } from '../resources/types.js';
import type { ManifestStore } from '../session/manifest.js';
import type {
  Session,
  Stage,
  StageRecord,
  TerminalStage,
} from '../session/types.js';
import type { ProcessSupervisor } from '../task/processSupervisor.js';
import type { FileCopier } from '../transfer/dataTransfer.js';
import type { LedgerStore } from '../transfer/ledger.js';
import type {
  CredentialProvider,
  Ledger,
  TransferBackend,
} from '../transfer/types.js';
import type { FileLock } from '../utils/atomicFile.js';

export type GitGate = Pick<GitManager, 'validate' | 'resetWorkingTree'>;

export interface LauncherDeps {
  picker: Picker;
  schemaMapper: SchemaMapper;
  /** Defaults to a flag-directory backend when one is configured. */
  transferBackend?: TransferBackend;
  credentialProvider?: CredentialProvider;
  supervisor?: ProcessSupervisor;
  gitManager?: GitGate;
  resourceProbe?: ResourceProbe;
  copyFile?: FileCopier;
  clock?: () => Date;
  sessionId?: (subject: string, startedAt: Date) => string;
  launcherVersion?: string;
}

/** Per-run state threaded through every stage. Nothing outlives a run. */
export interface RunContext {
  readonly config: RunConfig;
  readonly session: Session;
  readonly manifest: ManifestStore;
  readonly signal: AbortSignal;
  readonly monitor: ResourceMonitor;
  /** Identity resolution failure, surfaced once INIT is recorded. */
  initError: unknown;
  lock: FileLock | null;
  environment: EnvironmentSnapshot | null;
  gitState: GitState | null;
  resourceSnapshots: ResourceSnapshot[];
  taskProfile: TaskProfile | null;
  watch: ResourceWatch | null;
  schemaRecord: SchemaRecord | null;
  ledgerStore: LedgerStore | null;
  ledger: Ledger | null;
}

export interface StageDefinition {
  stage: Stage;
  gate?: (ctx: RunContext) => Promise<void>;
  run: (ctx: RunContext) => Promise<void>;
  cleanup?: (ctx: RunContext) => Promise<void>;
}

export type StageChangedListener = (stage: Stage, record: StageRecord) => void;

export interface ResumeResult {
  sessionId: string;
  ledger: Ledger;
  /** Ids of jobs the reconciliation put back in the queue. */
  requeued: string[];
  complete: boolean;
  aborted: boolean;
  /** Where the recovery pass left the session. */
  finalStage: TerminalStage;
  manifestPath: string;
}
