/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as osActual from 'node:os';
import path from 'node:path';
import fs from 'node:fs';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { FatalConfigError } from '@experiment-launcher/core';
import {
  loadSettings,
  mergeSettings,
  resolveEnvVarsInObject,
  SettingScope,
  SETTINGS_PATH_ENV,
  type Settings,
} from './settings.js';

const mocks = vi.hoisted(() => ({
  homedir: vi.fn(),
}));

vi.mock('node:os', async (importOriginal) => {
  const actualOs = await importOriginal<typeof osActual>();
  return {
    ...actualOs,
    homedir: mocks.homedir,
  };
});

const runSettings: Settings = {
  dataDir: '/data',
  rigId: 'rig-3',
  task: { profiles: [{ name: 'reversal', command: 'run-task' }] },
  transfer: { destination: '/archive' },
};

describe('Settings Loading and Merging', () => {
  let tempHomeDir: string;
  let tempWorkspaceDir: string;
  let userSettingsPath: string;
  let workspaceSettingsPath: string;

  const writeJson = (filePath: string, content: unknown) => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify(content));
  };

  beforeEach(() => {
    vi.resetAllMocks();
    tempHomeDir = fs.mkdtempSync(path.join(osActual.tmpdir(), 'launcher-test-home-'));
    mocks.homedir.mockReturnValue(tempHomeDir);
    tempWorkspaceDir = fs.mkdtempSync(
      path.join(osActual.tmpdir(), 'launcher-test-workspace-'),
    );
    userSettingsPath = path.join(tempHomeDir, '.experiment-launcher', 'settings.json');
    workspaceSettingsPath = path.join(
      tempWorkspaceDir,
      '.experiment-launcher',
      'settings.json',
    );
  });

  afterEach(() => {
    fs.rmSync(tempHomeDir, { recursive: true, force: true });
    fs.rmSync(tempWorkspaceDir, { recursive: true, force: true });
    delete process.env[SETTINGS_PATH_ENV];
    vi.restoreAllMocks();
  });

  describe('loadSettings', () => {
    it('should load empty settings if no files exist', () => {
      const settings = loadSettings(tempWorkspaceDir);
      expect(settings.user.settings).toEqual({});
      expect(settings.workspace.settings).toEqual({});
      expect(settings.override).toBeNull();
      expect(settings.merged).toEqual({});
    });

    it('should let workspace settings win over user settings', () => {
      writeJson(userSettingsPath, {
        operator: 'jdoe',
        transfer: { destination: '/archive/user', workers: 2 },
      });
      writeJson(workspaceSettingsPath, {
        transfer: { destination: '/archive/workspace' },
      });

      const settings = loadSettings(tempWorkspaceDir);

      expect(settings.forScope(SettingScope.User)?.path).toBe(userSettingsPath);
      expect(settings.merged).toEqual({
        operator: 'jdoe',
        transfer: { destination: '/archive/workspace', workers: 2 },
      });
    });

    it('should layer the file named by the environment on top', () => {
      const overridePath = path.join(tempWorkspaceDir, 'rig.json');
      writeJson(workspaceSettingsPath, { rigId: 'rig-1', debug: false });
      writeJson(overridePath, { rigId: 'rig-9' });
      process.env[SETTINGS_PATH_ENV] = overridePath;

      const settings = loadSettings(tempWorkspaceDir);

      expect(settings.forScope(SettingScope.Override)?.path).toBe(overridePath);
      expect(settings.merged).toEqual({ rigId: 'rig-9', debug: false });
    });

    it('should report a missing override file', () => {
      process.env[SETTINGS_PATH_ENV] = path.join(tempWorkspaceDir, 'absent.json');

      expect(() => loadSettings(tempWorkspaceDir)).toThrow(
        `Error in ${path.join(tempWorkspaceDir, 'absent.json')}: file named by ${SETTINGS_PATH_ENV} does not exist`,
      );
    });

    it('should report every file with JSON parsing errors', () => {
      fs.mkdirSync(path.dirname(userSettingsPath), { recursive: true });
      fs.writeFileSync(userSettingsPath, 'invalid json');
      fs.mkdirSync(path.dirname(workspaceSettingsPath), { recursive: true });
      fs.writeFileSync(workspaceSettingsPath, 'invalid json');

      try {
        loadSettings(tempWorkspaceDir);
        throw new Error('loadSettings should have thrown a FatalConfigError');
      } catch (e) {
        expect(e).toBeInstanceOf(FatalConfigError);
        const message = e instanceof Error ? e.message : '';
        expect(message).toContain(`Error in ${userSettingsPath}`);
        expect(message).toContain(`Error in ${workspaceSettingsPath}`);
        expect(message).toContain('Please fix the configuration file(s) and try again.');
      }
    });

    it('should reject a settings file that is not an object', () => {
      writeJson(workspaceSettingsPath, ['not', 'settings']);

      expect(() => loadSettings(tempWorkspaceDir)).toThrow(
        `Error in ${workspaceSettingsPath}: settings must be a JSON object`,
      );
    });

    it('should resolve environment variables in settings', () => {
      process.env['TEST_ARCHIVE_ROOT'] = '/mnt/archive';
      writeJson(userSettingsPath, {
        transfer: { destination: '${TEST_ARCHIVE_ROOT}/rig-3' },
        dataDir: '$TEST_ARCHIVE_ROOT',
      });

      const settings = loadSettings(tempWorkspaceDir);

      expect(settings.merged).toEqual({
        transfer: { destination: '/mnt/archive/rig-3' },
        dataDir: '/mnt/archive',
      });
      delete process.env['TEST_ARCHIVE_ROOT'];
    });
  });

  describe('toRunConfig', () => {
    it('should validate the merged settings with flags applied last', () => {
      writeJson(workspaceSettingsPath, runSettings);

      const config = loadSettings(tempWorkspaceDir).toRunConfig({
        subject: 'm042',
        transfer: { workers: 8 },
      });

      expect(config.subject).toBe('m042');
      expect(config.transfer.destination).toBe('/archive');
      expect(config.transfer.workers).toBe(8);
    });

    it('should surface configuration problems as a FatalConfigError', () => {
      writeJson(workspaceSettingsPath, { ...runSettings, transfer: {} });

      expect(() => loadSettings(tempWorkspaceDir).toRunConfig()).toThrow(
        '  - transfer.destination: Required',
      );
    });
  });
});

describe('mergeSettings', () => {
  it('replaces arrays instead of concatenating them', () => {
    expect(
      mergeSettings(
        { transfer: { allowedProjects: ['a', 'b'] } },
        { transfer: { allowedProjects: ['c'] } },
      ),
    ).toEqual({ transfer: { allowedProjects: ['c'] } });
  });

  it('ignores undefined values from later layers', () => {
    expect(mergeSettings({ operator: 'jdoe' }, { operator: undefined })).toEqual({
      operator: 'jdoe',
    });
  });
});

describe('resolveEnvVarsInObject', () => {
  it('leaves unset variables as written', () => {
    delete process.env['TEST_UNSET_VARIABLE'];
    expect(resolveEnvVarsInObject({ value: '$TEST_UNSET_VARIABLE' })).toEqual({
      value: '$TEST_UNSET_VARIABLE',
    });
  });
});
