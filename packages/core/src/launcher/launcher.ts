/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { EventEmitter } from 'node:events';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import {
  NAME_PATTERN,
  NAME_PATTERN_MESSAGE,
  type RunConfig,
  type TaskProfile,
} from '../config/config.js';
import { captureEnvironment } from '../environment/snapshot.js';
import { GitManager, GitValidationError } from '../git/gitManager.js';
import { parseVersionConstraint } from '../git/versionPolicy.js';
import { DataMapper } from '../mapper/dataMapper.js';
import type { SchemaRecord } from '../mapper/types.js';
import {
  DecisionId,
  type ConfirmRequest,
  type TextValidator,
} from '../picker/types.js';
import {
  describeFailingMetrics,
  ResourceMonitor,
} from '../resources/resourceMonitor.js';
import type { ResourceSnapshot, ResourceThresholds } from '../resources/types.js';
import { MANIFEST_FILENAME, ManifestStore } from '../session/manifest.js';
import { canTransition } from '../session/stageMachine.js';
import {
  Stage,
  type Session,
  type SessionResult,
  type StageOutcome,
  type StageRecord,
  type TerminalStage,
} from '../session/types.js';
import {
  ChildProcessSupervisor,
  taskErrorFor,
  type ProcessSupervisor,
  type TaskOutcome,
  type TaskSpec,
} from '../task/processSupervisor.js';
import {
  DataTransfer,
  isLedgerComplete,
  summarizeLedger,
} from '../transfer/dataTransfer.js';
import { FlagDirectoryBackend } from '../transfer/flagDirectoryBackend.js';
import {
  buildLedger,
  LedgerStore,
  reconcileLedger,
  SESSION_LOG_FILENAME,
  type ReconcileOptions,
} from '../transfer/ledger.js';
import type { Ledger, TransferBackend } from '../transfer/types.js';
import {
  acquireFileLock,
  readJsonFile,
  writeJsonAtomic,
  type FileLock,
} from '../utils/atomicFile.js';
import { debugLogger } from '../utils/debugLogger.js';
import {
  abortErrorFromSignal,
  AbortError,
  FatalConfigError,
  getErrorMessage,
  LauncherError,
  MappingError,
  toErrorContext,
  TransferError,
  ValidationError,
} from '../utils/errors.js';
import type {
  GitGate,
  LauncherDeps,
  ResumeResult,
  RunContext,
  StageChangedListener,
  StageDefinition,
} from './types.js';

export const SCHEMA_RECORD_FILENAME = 'session.record.json';
const DATA_DIR_LOCK = '.launcher';

export const validateName: TextValidator = (value) =>
  NAME_PATTERN.test(value) ? null : NAME_PATTERN_MESSAGE;

/** `<subject>_<YYYY-MM-DDTHHMMSS>` in UTC. */
export function defaultSessionId(subject: string, startedAt: Date): string {
  const stamp = startedAt.toISOString().replace(/[:.]/g, '').slice(0, 17);
  return `${subject}_${stamp}`;
}

function recordErrorOf(error: unknown, stage: Stage): StageRecord['error'] {
  return {
    ...toErrorContext(error, stage),
    kind: error instanceof LauncherError ? error.kind : 'internal',
    message: getErrorMessage(error),
  };
}

function terminalOutcome(stage: TerminalStage): StageOutcome {
  switch (stage) {
    case Stage.DONE:
      return 'completed';
    case Stage.ABORTED:
      return 'aborted';
    default:
      return 'failed';
  }
}

function incompleteTransferError(ledger: Ledger, destination: string): TransferError {
  const summary = summarizeLedger(ledger);
  const failedRecords = ledger.records.filter((record) => record.state === 'FAILED');
  const records =
    failedRecords.length > 0 ? `, ${failedRecords.length} session record(s) not copied` : '';
  return new TransferError(
    `Transfer incomplete: ${summary.confirmed}/${summary.total} file(s) confirmed, ${summary.failed} failed${records}, notification ${ledger.notification.state}.`,
    false,
    { stage: Stage.TRANSFER_DATA, entity: destination },
  );
}

/** The session's own log and manifest, copied after its data. */
function sessionRecords(directory: string): string[] {
  return [
    path.join(directory, SESSION_LOG_FILENAME),
    path.join(directory, MANIFEST_FILENAME),
  ];
}

/**
 * Drives one experiment session through its stages. Each call to `run`
 * owns its own RunContext; the launcher itself only tracks the abort
 * controller of the run in progress.
 */
export class Launcher {
  private readonly emitter = new EventEmitter();
  private readonly supervisor: ProcessSupervisor;
  private readonly git: GitGate;
  private readonly clock: () => Date;
  private active: AbortController | null = null;

  private readonly stages: readonly StageDefinition[] = [
    { stage: Stage.INIT, run: (ctx) => this.initialize(ctx) },
    { stage: Stage.VALIDATE_ENV, run: (ctx) => this.validateEnvironment(ctx) },
    {
      stage: Stage.RUN_TASK,
      run: (ctx) => this.runTask(ctx),
      cleanup: (ctx) => this.cleanupTask(ctx),
    },
    { stage: Stage.MAP_METADATA, run: (ctx) => this.mapMetadata(ctx) },
    {
      stage: Stage.TRANSFER_DATA,
      gate: (ctx) => this.transferGate(ctx),
      run: (ctx) => this.transferData(ctx),
      cleanup: (ctx) => this.cleanupTransfer(ctx),
    },
  ];

  constructor(private readonly deps: LauncherDeps) {
    this.supervisor = deps.supervisor ?? new ChildProcessSupervisor();
    this.git = deps.gitManager ?? new GitManager();
    this.clock = deps.clock ?? (() => new Date());
  }

  on(event: 'stageChanged', listener: StageChangedListener): this {
    this.emitter.on(event, listener);
    return this;
  }

  off(event: 'stageChanged', listener: StageChangedListener): this {
    this.emitter.off(event, listener);
    return this;
  }

  /** Requests an abort of the run in progress; a no-op when idle. */
  abort(reason: 'operator' | 'resource' = 'operator', message?: string): void {
    if (this.active && !this.active.signal.aborted) {
      debugLogger.warn(`[launcher] Abort requested (${reason})`);
      this.active.abort(new AbortError(reason, message));
    }
  }

  isRunning(): boolean {
    return this.active !== null;
  }

  async run(config: RunConfig): Promise<SessionResult> {
    if (this.active) {
      throw new Error('A run is already in progress.');
    }
    const controller = new AbortController();
    this.active = controller;
    try {
      const ctx = await this.createContext(config, controller.signal);
      return await this.drive(ctx);
    } finally {
      this.active = null;
      debugLogger.attachFile(null);
    }
  }

  /**
   * Runs another transfer pass for an ended session, for recovery after
   * PARTIAL or an interrupted transfer. The pass is appended to the
   * session's manifest: TRANSFER_DATA, then DONE, PARTIAL or ABORTED. The
   * persisted ledger is reconciled first; a session that never reached
   * TRANSFER_DATA gets a fresh one.
   */
  async resumeTransfer(
    sessionDirectory: string,
    config: RunConfig,
    options: ReconcileOptions = {},
  ): Promise<ResumeResult> {
    if (this.active) {
      throw new Error('A run is already in progress.');
    }
    const controller = new AbortController();
    this.active = controller;
    const directory = path.resolve(sessionDirectory);
    let lock: FileLock | null = null;
    try {
      const manifest = await ManifestStore.open(directory);
      if (!manifest) {
        throw new FatalConfigError(`${directory} is not a session directory.`);
      }
      const { session, history, schemaRecord } = manifest.snapshot();
      const last = history.at(-1)?.stage;
      if (last === undefined || !canTransition(last, Stage.TRANSFER_DATA)) {
        throw new FatalConfigError(
          `Session ${session.id} is at ${last ?? 'no stage'}; only PARTIAL or ABORTED sessions can resume their transfer.`,
        );
      }
      lock = await acquireFileLock(
        path.join(path.resolve(config.dataDir), DATA_DIR_LOCK),
      );
      debugLogger.setDebugEnabled(config.debug || debugLogger.isDebugEnabled());
      debugLogger.attachFile(path.join(directory, SESSION_LOG_FILENAME));

      const pass = { manifest, session };
      session.stage = Stage.TRANSFER_DATA;
      await this.record(pass, Stage.TRANSFER_DATA, 'entered');

      let outcome: { ledger: Ledger; requeued: string[] };
      try {
        outcome = await this.transferAgain(directory, session, schemaRecord, config, {
          ...options,
          signal: controller.signal,
          onLedger: (ledgerPath) => manifest.update({ ledgerPath }),
        });
      } catch (error) {
        const terminal = error instanceof AbortError ? Stage.ABORTED : Stage.PARTIAL;
        await this.endPass(pass, terminal, error);
        throw error;
      }

      const { ledger, requeued } = outcome;
      const aborted = controller.signal.aborted;
      const complete = isLedgerComplete(ledger);
      let finalStage: TerminalStage;
      if (aborted) {
        finalStage = Stage.ABORTED;
        await this.endPass(pass, finalStage, abortErrorFromSignal(controller.signal));
      } else if (complete) {
        finalStage = Stage.DONE;
        await this.endPass(pass, finalStage, null);
      } else {
        finalStage = Stage.PARTIAL;
        await this.endPass(
          pass,
          finalStage,
          incompleteTransferError(ledger, ledger.destination),
        );
      }

      return {
        sessionId: session.id,
        ledger,
        requeued,
        complete,
        aborted,
        finalStage,
        manifestPath: manifest.filePath,
      };
    } finally {
      await lock?.release();
      this.active = null;
      debugLogger.attachFile(null);
    }
  }

  private async transferAgain(
    directory: string,
    session: Session,
    schemaRecord: SchemaRecord | null,
    config: RunConfig,
    options: ReconcileOptions & {
      signal: AbortSignal;
      onLedger: (ledgerPath: string) => Promise<void>;
    },
  ): Promise<{ ledger: Ledger; requeued: string[] }> {
    const destination = path.resolve(
      config.transfer.destination,
      session.subject,
      session.id,
    );
    const store = LedgerStore.forSession(directory);
    const persisted = await store.load();
    let ledger: Ledger;
    let requeued: string[] = [];
    if (persisted) {
      const reconciled = await reconcileLedger(persisted, options);
      ledger = reconciled.ledger;
      requeued = reconciled.requeued;
      if (reconciled.changed.length > 0) {
        debugLogger.warn(
          `[launcher] Source changed since copy: ${reconciled.changed.join(', ')}`,
        );
      }
    } else {
      ledger = await buildLedger(
        session.id,
        directory,
        destination,
        config.transfer.fingerprint,
      );
    }
    await store.save(ledger);
    await options.onLedger(store.filePath);
    debugLogger.log(
      `[launcher] Resuming transfer of ${session.id}: ${requeued.length} job(s) re-queued`,
    );

    try {
      ledger = await new DataTransfer({
        workers: config.transfer.workers,
        retry: config.transfer.retry,
        store,
        backend: this.transferBackend(config),
        credentialProvider: this.deps.credentialProvider,
        copyFile: this.deps.copyFile,
        signal: options.signal,
        schemaRecord,
        records: sessionRecords(directory),
      }).transfer(ledger, destination);
    } finally {
      await store.flush();
    }
    return { ledger, requeued };
  }

  /** Closes a recovery pass with its TRANSFER_DATA outcome and terminal stage. */
  private async endPass(
    pass: Pick<RunContext, 'manifest' | 'session'>,
    terminal: TerminalStage,
    error: unknown,
  ): Promise<void> {
    if (terminal === Stage.DONE) {
      await this.record(pass, Stage.TRANSFER_DATA, 'completed');
    } else if (terminal === Stage.PARTIAL) {
      await this.record(pass, Stage.TRANSFER_DATA, 'failed', { error });
    }
    pass.session.stage = terminal;
    pass.session.status = terminal;
    await this.record(pass, terminal, terminalOutcome(terminal), {
      error: error ?? undefined,
      errorStage: Stage.TRANSFER_DATA,
    });
    const summary = `[launcher] Recovery pass for ${pass.session.id} ended ${terminal}`;
    if (terminal === Stage.DONE) {
      debugLogger.log(summary);
    } else {
      debugLogger.warn(summary);
    }
  }

  private async createContext(
    config: RunConfig,
    signal: AbortSignal,
  ): Promise<RunContext> {
    let initError: unknown = null;
    let operator = config.operator ?? '';
    let subject = config.subject ?? '';
    try {
      if (!operator) {
        operator = await this.deps.picker.inputText(
          { id: DecisionId.OPERATOR, message: 'Operator name' },
          validateName,
        );
      }
      if (!subject) {
        subject = await this.deps.picker.inputText(
          { id: DecisionId.SUBJECT, message: 'Subject id' },
          validateName,
        );
      }
      // A RunConfig built in code skips the schema; names still become paths.
      for (const [field, value] of Object.entries({ operator, subject })) {
        const problem = validateName(value);
        if (problem !== null) {
          throw new ValidationError(`Invalid ${field} "${value}": ${problem}.`, [problem], {
            stage: Stage.INIT,
            entity: field,
          });
        }
      }
    } catch (error) {
      initError = error;
    }

    const startedAt = this.clock();
    const subjectDir = validateName(subject) === null ? subject : 'unknown';
    const id = (this.deps.sessionId ?? defaultSessionId)(subjectDir, startedAt);
    const directory = path.resolve(config.dataDir, subjectDir, id);
    await fs.mkdir(directory, { recursive: true });
    debugLogger.setDebugEnabled(config.debug || debugLogger.isDebugEnabled());
    debugLogger.attachFile(path.join(directory, SESSION_LOG_FILENAME));

    const session: Session = {
      id,
      startedAt: startedAt.toISOString(),
      operator: validateName(operator) === null ? operator : 'unknown',
      subject: subjectDir,
      rigId: config.rigId,
      directory,
      stage: Stage.INIT,
      status: null,
    };
    return {
      config,
      session,
      manifest: new ManifestStore(session),
      signal,
      monitor: new ResourceMonitor(
        {
          localPath: config.dataDir,
          destinationPath: config.transfer.destination,
        },
        this.deps.resourceProbe,
      ),
      initError,
      lock: null,
      environment: null,
      gitState: null,
      resourceSnapshots: [],
      taskProfile: null,
      watch: null,
      schemaRecord: null,
      ledgerStore: null,
      ledger: null,
    };
  }

  private async drive(ctx: RunContext): Promise<SessionResult> {
    const optional: readonly Stage[] = ctx.config.stages.optional;

    for (const definition of this.stages) {
      const { stage } = definition;
      ctx.session.stage = stage;
      await this.record(ctx, stage, 'entered');

      try {
        if (ctx.signal.aborted) {
          throw abortErrorFromSignal(ctx.signal);
        }
        await definition.gate?.(ctx);
        await definition.run(ctx);
        if (ctx.signal.aborted) {
          throw abortErrorFromSignal(ctx.signal);
        }
        await this.record(ctx, stage, 'completed');
      } catch (error) {
        if (error instanceof AbortError || ctx.signal.aborted) {
          const abortError =
            error instanceof AbortError ? error : abortErrorFromSignal(ctx.signal);
          await this.runCleanup(ctx, definition);
          return this.finish(ctx, Stage.ABORTED, abortError);
        }

        if (optional.includes(stage)) {
          const warning = `${stage} skipped after failure: ${getErrorMessage(error)}`;
          debugLogger.warn(`[launcher] ${warning}`);
          await this.runCleanup(ctx, definition);
          await this.record(ctx, stage, 'skipped', { warning, error });
          continue;
        }

        debugLogger.error(`[launcher] ${stage} failed: ${getErrorMessage(error)}`);
        await this.record(ctx, stage, 'failed', { error });
        await this.runCleanup(ctx, definition);
        // The task ran and its record exists; only the egress is incomplete.
        const terminal =
          stage === Stage.TRANSFER_DATA ? Stage.PARTIAL : Stage.FAILED;
        return this.finish(ctx, terminal, error);
      }
    }
    return this.finish(ctx, Stage.DONE, null);
  }

  private async runCleanup(
    ctx: RunContext,
    definition: StageDefinition,
  ): Promise<void> {
    if (!definition.cleanup) {
      return;
    }
    try {
      await definition.cleanup(ctx);
      await this.record(ctx, definition.stage, 'cleanup');
    } catch (error) {
      debugLogger.error(
        `[launcher] Cleanup of ${definition.stage} failed: ${getErrorMessage(error)}`,
      );
      await this.record(ctx, definition.stage, 'cleanup', { error });
    }
  }

  private async record(
    ctx: Pick<RunContext, 'manifest' | 'session'>,
    stage: Stage,
    outcome: StageOutcome,
    extra: { warning?: string; error?: unknown; errorStage?: Stage } = {},
  ): Promise<StageRecord> {
    const record: StageRecord = {
      stage,
      outcome,
      at: this.clock().toISOString(),
    };
    if (extra.warning !== undefined) {
      record.warning = extra.warning;
    }
    if (extra.error !== undefined && extra.error !== null) {
      record.error = recordErrorOf(extra.error, extra.errorStage ?? stage);
    }
    await ctx.manifest.appendStage(ctx.session, record);
    debugLogger.debug(`[launcher] ${stage} ${outcome}`);
    try {
      this.emitter.emit('stageChanged', stage, record);
    } catch (error) {
      debugLogger.warn(
        `[launcher] stageChanged listener threw: ${getErrorMessage(error)}`,
      );
    }
    return record;
  }

  private async finish(
    ctx: RunContext,
    terminal: TerminalStage,
    error: unknown,
  ): Promise<SessionResult> {
    const failedAt = ctx.session.stage;
    ctx.session.stage = terminal;
    ctx.session.status = terminal;
    const record = await this.record(ctx, terminal, terminalOutcome(terminal), {
      error: error ?? undefined,
      errorStage: failedAt,
    });

    if (ctx.lock) {
      await ctx.lock.release();
      ctx.lock = null;
    }
    const summary = `[launcher] Session ${ctx.session.id} ended ${terminal}`;
    if (terminal === Stage.DONE) {
      debugLogger.log(summary);
    } else {
      debugLogger.warn(summary);
    }

    return {
      session: { ...ctx.session },
      finalStage: terminal,
      history: [...ctx.manifest.history],
      gitState: ctx.gitState,
      resourceSnapshots: [...ctx.resourceSnapshots],
      schemaRecord: ctx.schemaRecord,
      ledger: ctx.ledger,
      environment: ctx.environment,
      error: record.error ?? null,
      abortReason: error instanceof AbortError ? error.reason : null,
      manifestPath: ctx.manifest.filePath,
    };
  }

  /**
   * Offers the operator a way out of `failure`. A picker that cannot answer
   * leaves `failure` as the stage's error; an abort still wins.
   */
  private async confirmRemediation(
    request: ConfirmRequest,
    failure: LauncherError,
  ): Promise<boolean> {
    try {
      return await this.deps.picker.confirm(request);
    } catch (error) {
      if (error instanceof AbortError) {
        throw error;
      }
      debugLogger.warn(
        `[launcher] ${request.id} unanswered: ${getErrorMessage(error)}`,
      );
      throw failure;
    }
  }

  // INIT

  private async initialize(ctx: RunContext): Promise<void> {
    if (ctx.initError !== null) {
      throw ctx.initError;
    }
    ctx.lock = await acquireFileLock(
      path.join(path.resolve(ctx.config.dataDir), DATA_DIR_LOCK),
    );
    ctx.environment = captureEnvironment(
      this.deps.launcherVersion ?? 'unknown',
      this.clock(),
    );
    await ctx.manifest.update({ environment: ctx.environment });
    debugLogger.log(
      `[launcher] Session ${ctx.session.id} for ${ctx.session.subject} by ${ctx.session.operator} on ${ctx.session.rigId}`,
    );
  }

  // VALIDATE_ENV

  private async validateEnvironment(ctx: RunContext): Promise<void> {
    const { repository } = ctx.config;
    const repoPath = path.resolve(repository.path);
    const constraint = parseVersionConstraint(repository.versionConstraint);

    try {
      ctx.gitState = await this.git.validate(repoPath, repository.policy, {
        constraint,
      });
    } catch (error) {
      if (!(error instanceof GitValidationError)) {
        throw error;
      }
      ctx.gitState = error.state;
      await ctx.manifest.update({ gitState: error.state });
      if (!error.state.dirty || !repository.offerReset) {
        throw error;
      }
      const reset = await this.confirmRemediation(
        {
          id: DecisionId.GIT_RESET,
          message: `Repository ${repoPath} has ${error.state.uncommitted.length} uncommitted change(s). Discard them and reset to ${error.state.commit}?`,
          defaultValue: false,
        },
        error,
      );
      if (!reset) {
        throw error;
      }
      await this.git.resetWorkingTree(repoPath);
      ctx.gitState = await this.git.validate(repoPath, repository.policy, {
        constraint,
      });
    }
    await ctx.manifest.update({ gitState: ctx.gitState });

    await this.resourceGate(ctx, 'pre-task', ctx.config.resources.preTask);
  }

  private async resourceGate(
    ctx: RunContext,
    checkpoint: string,
    thresholds: ResourceThresholds,
  ): Promise<void> {
    const snapshot = await ctx.monitor.check(thresholds, checkpoint);
    await this.addSnapshot(ctx, snapshot);
    if (!snapshot.passed) {
      const violations = describeFailingMetrics(snapshot);
      throw new ValidationError(
        `Resource check ${checkpoint} failed: ${violations.join('; ')}`,
        violations,
        { stage: ctx.session.stage, entity: checkpoint },
      );
    }
  }

  private async addSnapshot(
    ctx: RunContext,
    snapshot: ResourceSnapshot,
  ): Promise<void> {
    ctx.resourceSnapshots.push(snapshot);
    await ctx.manifest.addResourceSnapshot(snapshot);
  }

  // RUN_TASK

  private async selectProfile(ctx: RunContext): Promise<TaskProfile> {
    const { profiles, profile } = ctx.config.task;
    const configured = profiles.find((candidate) => candidate.name === profile);
    if (configured) {
      return configured;
    }
    const [only] = profiles;
    if (profiles.length === 1 && only) {
      return only;
    }
    const picked = await this.deps.picker.pickOne({
      id: DecisionId.TASK_PROFILE,
      message: 'Select a task profile',
      options: profiles.map((candidate) => ({
        key: candidate.name,
        label: candidate.name,
        value: candidate,
        description: [candidate.command, ...candidate.args].join(' '),
      })),
    });
    return picked.value;
  }

  private async runTask(ctx: RunContext): Promise<void> {
    const profile = await this.selectProfile(ctx);
    ctx.taskProfile = profile;
    const { task, resources, repository } = ctx.config;
    const { session } = ctx;

    const spec: TaskSpec = {
      name: profile.name,
      command: profile.command,
      args: profile.args,
      cwd: profile.cwd ?? path.resolve(repository.path),
      env: {
        ...profile.env,
        LAUNCHER_SESSION_ID: session.id,
        LAUNCHER_SESSION_DIR: session.directory,
        LAUNCHER_SUBJECT: session.subject,
        LAUNCHER_OPERATOR: session.operator,
        LAUNCHER_OUTPUT_FILE: path.join(session.directory, task.outputFile),
      },
      logDirectory: session.directory,
    };

    const { intervalMs, ...thresholds } = resources.monitor;
    const watch = ctx.monitor.watch(thresholds, intervalMs);
    ctx.watch = watch;
    watch.on('breach', (snapshot) => {
      this.abortRun(
        ctx,
        new AbortError(
          'resource',
          `Resource threshold breached during ${Stage.RUN_TASK}: ${describeFailingMetrics(snapshot).join('; ')}`,
        ),
      );
    });

    let outcome: TaskOutcome;
    try {
      outcome = await this.supervisor.run(spec, {
        signal: ctx.signal,
        timeoutMs: task.timeoutMs,
        pollIntervalMs: task.pollIntervalMs,
        killGraceMs: task.killGraceMs,
      });
    } finally {
      await this.stopWatch(ctx);
    }

    if (ctx.signal.aborted) {
      throw abortErrorFromSignal(ctx.signal);
    }
    const taskError = taskErrorFor(spec, outcome);
    if (taskError) {
      throw taskError;
    }
  }

  private abortRun(ctx: RunContext, error: AbortError): void {
    if (this.active?.signal === ctx.signal && !ctx.signal.aborted) {
      debugLogger.warn(`[launcher] ${error.message}`);
      this.active.abort(error);
    }
  }

  private async stopWatch(ctx: RunContext): Promise<void> {
    const { watch } = ctx;
    if (!watch) {
      return;
    }
    ctx.watch = null;
    watch.stop();
    for (const snapshot of watch.snapshots) {
      await this.addSnapshot(ctx, snapshot);
    }
  }

  private async cleanupTask(ctx: RunContext): Promise<void> {
    await this.stopWatch(ctx);
    debugLogger.log(
      `[launcher] Task output kept in ${ctx.session.directory}`,
    );
  }

  // MAP_METADATA

  private async readTaskOutput(ctx: RunContext): Promise<unknown> {
    const outputPath = path.join(
      ctx.session.directory,
      ctx.config.task.outputFile,
    );
    let raw: unknown;
    try {
      raw = await readJsonFile(outputPath);
    } catch (error) {
      throw new MappingError(
        [{ path: '', message: `${outputPath} is not valid JSON (${getErrorMessage(error)})` }],
        { stage: Stage.MAP_METADATA, entity: outputPath, cause: error },
      );
    }
    if (raw === null) {
      throw new MappingError(
        [{ path: '', message: `${outputPath} was not written by the task` }],
        { stage: Stage.MAP_METADATA, entity: outputPath },
      );
    }
    return raw;
  }

  private async mapMetadata(ctx: RunContext): Promise<void> {
    const mapper = new DataMapper(this.deps.schemaMapper, this.clock);
    const { mapping } = ctx.config;

    for (let remediation = 0; ; remediation++) {
      try {
        const raw = await this.readTaskOutput(ctx);
        ctx.schemaRecord = mapper.map(raw, {
          session: ctx.session,
          gitState: ctx.gitState,
          environment: ctx.environment,
          taskProfile: ctx.taskProfile?.name ?? null,
        });
        break;
      } catch (error) {
        if (
          !(error instanceof MappingError) ||
          mapping.onError !== 'remediate' ||
          remediation >= mapping.maxRemediationAttempts
        ) {
          throw error;
        }
        debugLogger.warn(`[launcher] ${error.message}`);
        const retry = await this.confirmRemediation(
          {
            id: DecisionId.MAPPING_RETRY,
            message: `${error.message}\nCorrect the task output and map again?`,
            defaultValue: true,
          },
          error,
        );
        if (!retry) {
          throw error;
        }
      }
    }

    await writeJsonAtomic(
      path.join(ctx.session.directory, SCHEMA_RECORD_FILENAME),
      ctx.schemaRecord,
    );
    await ctx.manifest.update({ schemaRecord: ctx.schemaRecord });
  }

  // TRANSFER_DATA

  private async transferGate(ctx: RunContext): Promise<void> {
    await this.resourceGate(ctx, 'pre-transfer', ctx.config.resources.preTransfer);
    if (!ctx.config.transfer.confirm) {
      return;
    }
    const approved = await this.deps.picker.confirm({
      id: DecisionId.TRANSFER_CONFIRM,
      message: `Copy session ${ctx.session.id} to ${ctx.config.transfer.destination}?`,
      defaultValue: true,
    });
    if (!approved) {
      throw new ValidationError('Transfer declined by operator.', [], {
        stage: Stage.TRANSFER_DATA,
      });
    }
  }

  private transferBackend(config: RunConfig): TransferBackend | undefined {
    if (this.deps.transferBackend) {
      return this.deps.transferBackend;
    }
    const { flagDirectory, projectName, scheduleTime, allowedProjects } =
      config.transfer;
    if (flagDirectory && projectName) {
      return new FlagDirectoryBackend({
        flagDirectory,
        projectName,
        scheduleTime,
        allowedProjects,
      });
    }
    return undefined;
  }

  private async transferData(ctx: RunContext): Promise<void> {
    const { transfer } = ctx.config;
    const { session } = ctx;
    const destination = path.resolve(
      transfer.destination,
      session.subject,
      session.id,
    );
    const store = LedgerStore.forSession(session.directory);
    ctx.ledgerStore = store;

    const persisted = await store.load();
    const ledger = persisted
      ? (await reconcileLedger(persisted)).ledger
      : await buildLedger(
          session.id,
          session.directory,
          destination,
          transfer.fingerprint,
        );
    ctx.ledger = ledger;
    await store.save(ledger);
    await ctx.manifest.update({ ledgerPath: store.filePath });

    ctx.ledger = await new DataTransfer({
      workers: transfer.workers,
      retry: transfer.retry,
      store,
      backend: this.transferBackend(ctx.config),
      credentialProvider: this.deps.credentialProvider,
      copyFile: this.deps.copyFile,
      signal: ctx.signal,
      schemaRecord: ctx.schemaRecord,
      records: sessionRecords(session.directory),
    }).transfer(ledger, destination);

    if (ctx.signal.aborted) {
      throw abortErrorFromSignal(ctx.signal);
    }
    if (!isLedgerComplete(ctx.ledger)) {
      throw incompleteTransferError(ctx.ledger, destination);
    }
  }

  private async cleanupTransfer(ctx: RunContext): Promise<void> {
    await ctx.ledgerStore?.flush();
  }
}
