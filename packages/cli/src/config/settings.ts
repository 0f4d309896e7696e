/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  FatalConfigError,
  getErrorMessage,
  parseRunConfig,
  type RunConfig,
} from '@experiment-launcher/core';

export const SETTINGS_DIRECTORY_NAME = '.experiment-launcher';
export const SETTINGS_FILENAME = 'settings.json';
export const SETTINGS_PATH_ENV = 'EXPERIMENT_LAUNCHER_SETTINGS_PATH';

/** Raw, partially specified run configuration as found in a settings file. */
export type Settings = { [key: string]: unknown };

export enum SettingScope {
  User = 'User',
  Workspace = 'Workspace',
  Override = 'Override',
}

export interface SettingsFile {
  settings: Settings;
  path: string;
}

export interface SettingsError {
  message: string;
  path: string;
}

export function getUserSettingsPath(): string {
  return path.join(os.homedir(), SETTINGS_DIRECTORY_NAME, SETTINGS_FILENAME);
}

export function getWorkspaceSettingsPath(workspaceDir: string): string {
  return path.join(workspaceDir, SETTINGS_DIRECTORY_NAME, SETTINGS_FILENAME);
}

function isSettings(value: unknown): value is Settings {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const ENV_VAR_PATTERN = /\$(?:(\w+)|\{([^}]+)\})/g;

function resolveEnvVarsInString(value: string): string {
  return value.replace(ENV_VAR_PATTERN, (match, bare?: string, braced?: string) => {
    const name = bare ?? braced ?? '';
    return process.env[name] ?? match;
  });
}

/** Replaces `$VAR` and `${VAR}` in every string; unset variables stay as written. */
export function resolveEnvVarsInObject<T>(value: T): T;
export function resolveEnvVarsInObject(value: unknown): unknown {
  if (typeof value === 'string') {
    return resolveEnvVarsInString(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvVarsInObject(item));
  }
  if (isSettings(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, resolveEnvVarsInObject(item)]),
    );
  }
  return value;
}

/**
 * Deep-merges settings layers left to right. Objects merge key by key;
 * arrays and scalars from a later layer replace earlier ones.
 */
export function mergeSettings(...layers: Settings[]): Settings {
  const merged: Settings = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) {
        continue;
      }
      const existing = merged[key];
      merged[key] =
        isSettings(existing) && isSettings(value)
          ? mergeSettings(existing, value)
          : value;
    }
  }
  return merged;
}

export class LoadedSettings {
  readonly merged: Settings;

  constructor(
    readonly user: SettingsFile,
    readonly workspace: SettingsFile,
    readonly override: SettingsFile | null,
  ) {
    this.merged = mergeSettings(
      user.settings,
      workspace.settings,
      override?.settings ?? {},
    );
  }

  forScope(scope: SettingScope): SettingsFile | null {
    switch (scope) {
      case SettingScope.User:
        return this.user;
      case SettingScope.Workspace:
        return this.workspace;
      case SettingScope.Override:
        return this.override;
      default: {
        const exhaustive: never = scope;
        throw new Error(`Unknown setting scope: ${String(exhaustive)}`);
      }
    }
  }

  /**
   * Applies command-line overrides on top of every file and validates the
   * result into a RunConfig.
   */
  toRunConfig(flags: Settings = {}): RunConfig {
    return parseRunConfig(mergeSettings(this.merged, flags));
  }
}

function readSettingsFile(filePath: string, errors: SettingsError[]): Settings {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (!isSettings(parsed)) {
      errors.push({ path: filePath, message: 'settings must be a JSON object' });
      return {};
    }
    return resolveEnvVarsInObject(parsed);
  } catch (error) {
    errors.push({ path: filePath, message: getErrorMessage(error) });
    return {};
  }
}

/**
 * Loads user, workspace and (when `EXPERIMENT_LAUNCHER_SETTINGS_PATH` is set)
 * override settings. Later scopes win. Every unreadable file is reported in
 * one FatalConfigError.
 */
export function loadSettings(workspaceDir: string = process.cwd()): LoadedSettings {
  const errors: SettingsError[] = [];
  const userPath = getUserSettingsPath();
  const workspacePath = getWorkspaceSettingsPath(workspaceDir);
  const overridePath = process.env[SETTINGS_PATH_ENV];

  const user = { path: userPath, settings: readSettingsFile(userPath, errors) };
  // The home directory doubles as a workspace when launched from ~.
  const workspace =
    path.resolve(workspacePath) === path.resolve(userPath)
      ? { path: workspacePath, settings: {} }
      : { path: workspacePath, settings: readSettingsFile(workspacePath, errors) };

  let override: SettingsFile | null = null;
  if (overridePath) {
    if (!fs.existsSync(overridePath)) {
      errors.push({
        path: overridePath,
        message: `file named by ${SETTINGS_PATH_ENV} does not exist`,
      });
    } else {
      override = {
        path: overridePath,
        settings: readSettingsFile(overridePath, errors),
      };
    }
  }

  if (errors.length > 0) {
    const details = errors
      .map((error) => `Error in ${error.path}: ${error.message}`)
      .join('\n');
    throw new FatalConfigError(
      `${details}\nPlease fix the configuration file(s) and try again.`,
    );
  }
  return new LoadedSettings(user, workspace, override);
}
