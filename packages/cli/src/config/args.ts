/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { parseArgs } from 'node:util';
import { FatalConfigError } from '@experiment-launcher/core';
import type { Settings } from './settings.js';

export const USAGE = `Usage:
  experiment-launcher [run] [options]
  experiment-launcher resume-transfer <sessionDir> [--retry-failed] [options]

Options:
  --operator <name>          Operator running the session
  --subject <id>             Subject identifier
  --rig <id>                 Rig identifier (defaults to the hostname)
  --profile <name>           Task profile to run
  --data-dir <path>          Root directory for session data
  --destination <path>       Transfer destination root
  --repo <path>              Git repository holding the task code
  --policy <policy>          strict | force | version-only
  --version-constraint <r>   Semver range the task code must satisfy
  --workers <n>              Parallel transfer workers
  --headless                 Resolve every decision from picker defaults
  --debug                    Verbose logging
  --retry-failed             resume-transfer: re-queue permanently failed files
  -h, --help                 Show this help
  -v, --version              Print the version`;

export type Command =
  | { name: 'run' }
  | { name: 'resume-transfer'; sessionDirectory: string; retryFailed: boolean };

export interface CliArgs {
  command: Command;
  /** Settings overlay built from flags; applied after every settings file. */
  flags: Settings;
  help: boolean;
  version: boolean;
}

function parseWorkers(value: string): number {
  const workers = Number(value);
  if (!Number.isInteger(workers) || workers <= 0) {
    throw new FatalConfigError(`--workers must be a positive integer, got "${value}".`);
  }
  return workers;
}

const OPTIONS = {
  operator: { type: 'string' },
  subject: { type: 'string' },
  rig: { type: 'string' },
  profile: { type: 'string' },
  'data-dir': { type: 'string' },
  destination: { type: 'string' },
  repo: { type: 'string' },
  policy: { type: 'string' },
  'version-constraint': { type: 'string' },
  workers: { type: 'string' },
  headless: { type: 'boolean', default: false },
  debug: { type: 'boolean' },
  'retry-failed': { type: 'boolean', default: false },
  help: { type: 'boolean', short: 'h', default: false },
  version: { type: 'boolean', short: 'v', default: false },
} as const;

function parseFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true });
  } catch (error) {
    throw new FatalConfigError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseFlags(argv);

  const [name = 'run', ...rest] = positionals;
  let command: Command;
  if (name === 'run') {
    if (rest.length > 0) {
      throw new FatalConfigError(`Unexpected argument: ${rest[0]}`);
    }
    command = { name: 'run' };
  } else if (name === 'resume-transfer') {
    const [sessionDirectory, ...extra] = rest;
    if (sessionDirectory === undefined) {
      throw new FatalConfigError('resume-transfer needs a session directory.');
    }
    if (extra.length > 0) {
      throw new FatalConfigError(`Unexpected argument: ${extra[0]}`);
    }
    command = {
      name: 'resume-transfer',
      sessionDirectory,
      retryFailed: values['retry-failed'],
    };
  } else {
    throw new FatalConfigError(`Unknown command: ${name}`);
  }

  const flags: Settings = {
    operator: values.operator,
    subject: values.subject,
    rigId: values.rig,
    dataDir: values['data-dir'],
    debug: values.debug,
    repository: {
      path: values.repo,
      policy: values.policy,
      versionConstraint: values['version-constraint'],
    },
    task: { profile: values.profile },
    transfer: {
      destination: values.destination,
      workers: values.workers === undefined ? undefined : parseWorkers(values.workers),
    },
    picker: { mode: values.headless ? 'headless' : undefined },
  };

  return { command, flags, help: values.help, version: values.version };
}
