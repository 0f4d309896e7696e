/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { inspect } from 'node:util';

type LogLevel = 'debug' | 'log' | 'warn' | 'error';

function formatArgs(args: unknown[]): string {
  return args
    .map((arg) =>
      typeof arg === 'string' ? arg : inspect(arg, { depth: 4, breakLength: Infinity }),
    )
    .join(' ');
}

/**
 * Shared logger for the launcher. Writes to the console and, while a session
 * is active, mirrors every line into that session's `launcher.log`.
 */
export class DebugLogger {
  private logFile: string | null = null;
  private debugEnabled = process.env['LAUNCHER_DEBUG'] === '1';

  setDebugEnabled(enabled: boolean): void {
    this.debugEnabled = enabled;
  }

  isDebugEnabled(): boolean {
    return this.debugEnabled;
  }

  /**
   * Starts mirroring output into `filePath`. Passing `null` detaches the
   * current file.
   */
  attachFile(filePath: string | null): void {
    if (filePath) {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
    }
    this.logFile = filePath;
  }

  getLogFile(): string | null {
    return this.logFile;
  }

  debug(...args: unknown[]): void {
    if (this.debugEnabled) {
      console.debug(...args);
    }
    this.writeToFile('debug', args);
  }

  log(...args: unknown[]): void {
    console.log(...args);
    this.writeToFile('log', args);
  }

  warn(...args: unknown[]): void {
    console.warn(...args);
    this.writeToFile('warn', args);
  }

  error(...args: unknown[]): void {
    console.error(...args);
    this.writeToFile('error', args);
  }

  private writeToFile(level: LogLevel, args: unknown[]): void {
    if (!this.logFile) return;
    const line = `${new Date().toISOString()} ${level.toUpperCase()} ${formatArgs(args)}\n`;
    try {
      fs.appendFileSync(this.logFile, line, 'utf-8');
    } catch (error) {
      // The console already has the line; stop mirroring to a broken file.
      console.error(`Failed to write to log file ${this.logFile}:`, error);
      this.logFile = null;
    }
  }
}

export const debugLogger = new DebugLogger();
