/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { render } from 'ink';
import {
  createJsonSessionSchemaMapper,
  debugLogger,
  FatalConfigError,
  getErrorMessage,
  HeadlessPicker,
  Launcher,
  type LauncherDeps,
  type Picker,
  type RunConfig,
} from '@experiment-launcher/core';
import { parseCliArgs, USAGE, type CliArgs } from './config/args.js';
import { EnvironmentCredentialProvider } from './config/credentials.js';
import { loadSettings } from './config/settings.js';
import { AppHeader } from './ui/components/AppHeader.js';
import { InteractivePicker } from './ui/InteractivePicker.js';
import { ExitCode, exitCodeForResume, exitCodeForSession } from './utils/exitCodes.js';
import { formatResumeSummary, formatSessionSummary } from './utils/summary.js';
import { getCliVersion } from './utils/version.js';

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  /** Dialogs need a TTY on stdin. */
  isInteractiveTerminal: boolean;
  cwd: string;
  /** Overrides for the launcher's collaborators; the picker is always chosen here. */
  launcherDeps?: Partial<Omit<LauncherDeps, 'picker'>>;
}

const defaultIO = (): CliIO => ({
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
  isInteractiveTerminal: Boolean(process.stdin.isTTY),
  cwd: process.cwd(),
});

function createPicker(config: RunConfig, io: CliIO): Picker {
  if (config.picker.mode === 'headless') {
    return new HeadlessPicker(config.picker.defaults);
  }
  if (!io.isInteractiveTerminal) {
    debugLogger.warn(
      '[cli] stdin is not a terminal; resolving decisions from picker defaults.',
    );
    return new HeadlessPicker(config.picker.defaults);
  }
  return new InteractivePicker();
}

function renderHeader(config: RunConfig, version: string): void {
  const header = render(
    <AppHeader version={version} rigId={config.rigId} dataDir={config.dataDir} />,
  );
  header.unmount();
}

async function execute(args: CliArgs, io: CliIO, version: string): Promise<ExitCode> {
  const config = loadSettings(io.cwd).toRunConfig(args.flags);
  debugLogger.setDebugEnabled(config.debug);

  const picker = createPicker(config, io);
  const launcher = new Launcher({
    schemaMapper: createJsonSessionSchemaMapper(),
    credentialProvider: new EnvironmentCredentialProvider(),
    launcherVersion: version,
    ...io.launcherDeps,
    picker,
  });

  const onSigint = () => launcher.abort('operator');
  process.on('SIGINT', onSigint);
  try {
    if (args.command.name === 'resume-transfer') {
      const result = await launcher.resumeTransfer(args.command.sessionDirectory, config, {
        retryFailed: args.command.retryFailed,
      });
      formatResumeSummary(result).forEach(io.stdout);
      return exitCodeForResume(result);
    }

    if (picker.kind === 'interactive') {
      renderHeader(config, version);
    }
    const result = await launcher.run(config);
    formatSessionSummary(result).forEach(io.stdout);
    return exitCodeForSession(result);
  } finally {
    process.off('SIGINT', onSigint);
  }
}

/** Runs one CLI invocation and returns its exit code. */
export async function main(argv: string[], io: CliIO = defaultIO()): Promise<ExitCode> {
  const version = getCliVersion();
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      io.stdout(USAGE);
      return ExitCode.SUCCESS;
    }
    if (args.version) {
      io.stdout(version);
      return ExitCode.SUCCESS;
    }
    return await execute(args, io, version);
  } catch (error) {
    if (error instanceof FatalConfigError) {
      io.stderr(error.message);
      return ExitCode.VALIDATION;
    }
    io.stderr(`Unexpected error: ${getErrorMessage(error)}`);
    return ExitCode.VALIDATION;
  }
}
