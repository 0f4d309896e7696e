/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { FatalConfigError } from '@experiment-launcher/core';
import { parseCliArgs } from './args.js';
import { LoadedSettings } from './settings.js';

describe('parseCliArgs', () => {
  it('defaults to the run command', () => {
    const args = parseCliArgs([]);
    expect(args.command).toEqual({ name: 'run' });
    expect(args.help).toBe(false);
    expect(args.version).toBe(false);
  });

  it('maps flags onto the settings layout', () => {
    const args = parseCliArgs([
      'run',
      '--subject',
      'm042',
      '--workers',
      '8',
      '--policy',
      'force',
      '--profile',
      'reversal',
      '--headless',
    ]);

    expect(args.flags).toEqual({
      subject: 'm042',
      repository: { policy: 'force' },
      task: { profile: 'reversal' },
      transfer: { workers: 8 },
      picker: { mode: 'headless' },
    });
  });

  it('parses resume-transfer with its session directory', () => {
    expect(
      parseCliArgs(['resume-transfer', '/data/m042/session-1', '--retry-failed']).command,
    ).toEqual({
      name: 'resume-transfer',
      sessionDirectory: '/data/m042/session-1',
      retryFailed: true,
    });
  });

  it('requires a session directory for resume-transfer', () => {
    expect(() => parseCliArgs(['resume-transfer'])).toThrow(
      'resume-transfer needs a session directory.',
    );
  });

  it('rejects unknown commands', () => {
    expect(() => parseCliArgs(['transfer'])).toThrow('Unknown command: transfer');
  });

  it('rejects a worker count that is not a positive integer', () => {
    expect(() => parseCliArgs(['--workers', '0'])).toThrow(
      '--workers must be a positive integer, got "0".',
    );
  });

  it('wraps unknown options in a FatalConfigError', () => {
    expect(() => parseCliArgs(['--colour'])).toThrow(FatalConfigError);
  });

  it('lets flags win over settings files', () => {
    const settings = new LoadedSettings(
      {
        path: '/home/op/.experiment-launcher/settings.json',
        settings: {
          dataDir: '/data',
          rigId: 'rig-3',
          task: { profiles: [{ name: 'reversal', command: 'run-task' }] },
          transfer: { destination: '/archive', workers: 2 },
        },
      },
      { path: '/work/.experiment-launcher/settings.json', settings: {} },
      null,
    );

    const config = settings.toRunConfig(
      parseCliArgs(['--workers', '8', '--headless', '--rig', 'rig-7']).flags,
    );

    expect(config.rigId).toBe('rig-7');
    expect(config.transfer.destination).toBe('/archive');
    expect(config.transfer.workers).toBe(8);
    expect(config.picker.mode).toBe('headless');
    expect(config.repository.policy).toBe('strict');
  });
});
