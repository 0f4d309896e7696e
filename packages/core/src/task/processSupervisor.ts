/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { spawn } from 'node:child_process';
import { createWriteStream } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { finished } from 'node:stream/promises';
import { debugLogger } from '../utils/debugLogger.js';
import { getErrorMessage, TaskError } from '../utils/errors.js';
import { Stage } from '../session/types.js';

export const STDOUT_LOG = 'task.stdout.log';
export const STDERR_LOG = 'task.stderr.log';

export interface TaskSpec {
  name: string;
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
  /** Where the stdout and stderr logs are written. */
  logDirectory: string;
}

export interface SuperviseOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  /** How often a running task is checked on and reported in the debug log. */
  pollIntervalMs?: number;
  /** Delay between SIGTERM and SIGKILL. */
  killGraceMs?: number;
}

export interface TaskOutcome {
  pid: number | null;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  aborted: boolean;
  durationMs: number;
  stdoutPath: string;
  stderrPath: string;
}

export interface ProcessSupervisor {
  run(spec: TaskSpec, options?: SuperviseOptions): Promise<TaskOutcome>;
}

const DEFAULT_POLL_INTERVAL_MS = 1000;
const DEFAULT_KILL_GRACE_MS = 5000;

export class ChildProcessSupervisor implements ProcessSupervisor {
  async run(spec: TaskSpec, options: SuperviseOptions = {}): Promise<TaskOutcome> {
    await fs.mkdir(spec.logDirectory, { recursive: true });
    const stdoutPath = path.join(spec.logDirectory, STDOUT_LOG);
    const stderrPath = path.join(spec.logDirectory, STDERR_LOG);
    const stdoutLog = createWriteStream(stdoutPath, { flags: 'a' });
    const stderrLog = createWriteStream(stderrPath, { flags: 'a' });

    const startedAt = Date.now();
    let timedOut = false;
    let aborted = false;

    const child = spawn(spec.command, spec.args, {
      cwd: spec.cwd,
      env: { ...process.env, ...spec.env },
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });
    child.stdout.pipe(stdoutLog);
    child.stderr.pipe(stderrLog);
    debugLogger.log(
      `[task] Started ${spec.name} (pid ${child.pid ?? 'unknown'}): ${spec.command} ${spec.args.join(' ')}`,
    );

    let killTimer: NodeJS.Timeout | undefined;
    const terminate = (why: string) => {
      if (child.exitCode !== null || child.signalCode !== null || killTimer) {
        return;
      }
      debugLogger.warn(`[task] Stopping ${spec.name}: ${why}`);
      child.kill('SIGTERM');
      killTimer = setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          debugLogger.warn(`[task] ${spec.name} ignored SIGTERM, sending SIGKILL`);
          child.kill('SIGKILL');
        }
      }, options.killGraceMs ?? DEFAULT_KILL_GRACE_MS);
    };

    const onAbort = () => {
      aborted = true;
      terminate('run aborted');
    };
    if (options.signal?.aborted) {
      onAbort();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }

    const timeoutTimer =
      options.timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true;
            terminate(`timed out after ${options.timeoutMs}ms`);
          }, options.timeoutMs)
        : undefined;

    const pollTimer = setInterval(() => {
      if (options.signal?.aborted && !aborted) {
        onAbort();
        return;
      }
      debugLogger.debug(
        `[task] ${spec.name} running for ${Math.round((Date.now() - startedAt) / 1000)}s`,
      );
    }, options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS);

    try {
      const { code, signal } = await new Promise<{
        code: number | null;
        signal: NodeJS.Signals | null;
      }>((resolve, reject) => {
        child.once('error', reject);
        child.once('close', (code, signal) => resolve({ code, signal }));
      });
      await Promise.all([finished(stdoutLog), finished(stderrLog)]);

      const outcome: TaskOutcome = {
        pid: child.pid ?? null,
        exitCode: code,
        signal,
        timedOut,
        aborted,
        durationMs: Date.now() - startedAt,
        stdoutPath,
        stderrPath,
      };
      debugLogger.log(
        `[task] ${spec.name} finished: exit ${code ?? 'none'}${signal ? ` (${signal})` : ''} after ${outcome.durationMs}ms`,
      );
      return outcome;
    } catch (error) {
      stdoutLog.end();
      stderrLog.end();
      throw new TaskError(
        `Failed to start ${spec.name}: ${getErrorMessage(error)}`,
        null,
        false,
        { stage: Stage.RUN_TASK, entity: spec.command, cause: error },
      );
    } finally {
      clearInterval(pollTimer);
      clearTimeout(timeoutTimer);
      clearTimeout(killTimer);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }
}

/** Converts a finished outcome into the error it implies, if any. */
export function taskErrorFor(spec: TaskSpec, outcome: TaskOutcome): TaskError | null {
  if (outcome.aborted) {
    return null;
  }
  if (outcome.timedOut) {
    return new TaskError(
      `${spec.name} timed out after ${outcome.durationMs}ms.`,
      outcome.exitCode,
      true,
      { stage: Stage.RUN_TASK, entity: spec.name },
    );
  }
  if (outcome.exitCode !== 0) {
    return new TaskError(
      outcome.signal
        ? `${spec.name} was killed by ${outcome.signal}.`
        : `${spec.name} exited with code ${outcome.exitCode ?? 'unknown'}.`,
      outcome.exitCode,
      false,
      { stage: Stage.RUN_TASK, entity: spec.name },
    );
  }
  return null;
}
