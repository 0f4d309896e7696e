/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  ChildProcessSupervisor,
  taskErrorFor,
  type TaskSpec,
} from './processSupervisor.js';
import { TaskError } from '../utils/errors.js';

describe('ChildProcessSupervisor', () => {
  let logDirectory: string;
  const supervisor = new ChildProcessSupervisor();

  const nodeTask = (script: string): TaskSpec => ({
    name: 'test-task',
    command: process.execPath,
    args: ['-e', script],
    logDirectory,
  });

  beforeEach(() => {
    logDirectory = fs.mkdtempSync(path.join(os.tmpdir(), 'launcher-task-'));
  });

  afterEach(() => {
    fs.rmSync(logDirectory, { recursive: true, force: true });
  });

  it('captures stdout and stderr of a successful task', async () => {
    const spec = nodeTask(
      "process.stdout.write('hello\\n'); process.stderr.write('warn\\n');",
    );
    const outcome = await supervisor.run(spec, { pollIntervalMs: 50 });

    expect(outcome).toMatchObject({
      exitCode: 0,
      signal: null,
      timedOut: false,
      aborted: false,
    });
    expect(fs.readFileSync(outcome.stdoutPath, 'utf-8')).toBe('hello\n');
    expect(fs.readFileSync(outcome.stderrPath, 'utf-8')).toBe('warn\n');
    expect(taskErrorFor(spec, outcome)).toBeNull();
  });

  it('reports a non-zero exit as a task error', async () => {
    const spec = nodeTask('process.exit(3)');
    const outcome = await supervisor.run(spec);
    const error = taskErrorFor(spec, outcome);

    expect(outcome.exitCode).toBe(3);
    expect(error).toBeInstanceOf(TaskError);
    expect(error?.message).toBe('test-task exited with code 3.');
    expect(error?.exitCode).toBe(3);
  });

  it('terminates a task that runs past its timeout and keeps partial output', async () => {
    const spec = nodeTask(
      "process.stdout.write('started\\n'); setInterval(() => {}, 1000);",
    );
    const outcome = await supervisor.run(spec, {
      timeoutMs: 1500,
      pollIntervalMs: 100,
    });

    expect(outcome.timedOut).toBe(true);
    expect(outcome.signal).toBe('SIGTERM');
    expect(fs.readFileSync(outcome.stdoutPath, 'utf-8')).toBe('started\n');
    expect(taskErrorFor(spec, outcome)?.timedOut).toBe(true);
  });

  it('stops the task when the run is aborted', async () => {
    const controller = new AbortController();
    const spec = nodeTask('setInterval(() => {}, 1000);');
    setTimeout(() => controller.abort(), 300);

    const outcome = await supervisor.run(spec, {
      signal: controller.signal,
      pollIntervalMs: 50,
    });

    expect(outcome.aborted).toBe(true);
    expect(outcome.timedOut).toBe(false);
    expect(taskErrorFor(spec, outcome)).toBeNull();
  });

  it('escalates to SIGKILL when SIGTERM is ignored', async () => {
    const spec = nodeTask(
      "process.on('SIGTERM', () => {}); setInterval(() => {}, 1000);",
    );
    const outcome = await supervisor.run(spec, {
      timeoutMs: 1500,
      killGraceMs: 200,
    });

    expect(outcome.signal).toBe('SIGKILL');
    expect(taskErrorFor(spec, outcome)?.message).toMatch(/^test-task timed out/);
  });

  it('raises a task error when the command cannot be started', async () => {
    const spec: TaskSpec = {
      name: 'missing',
      command: path.join(logDirectory, 'does-not-exist'),
      args: [],
      logDirectory,
    };
    await expect(supervisor.run(spec)).rejects.toThrow(/^Failed to start missing:/);
  });
});
