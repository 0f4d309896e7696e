/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Stage } from '../session/types.js';

/**
 * Structured context attached to every launcher error and written into the
 * session manifest when the error ends a stage.
 */
export interface ErrorContext {
  stage?: Stage;
  timestamp: string;
  entity?: string;
  cause?: string;
}

export interface LauncherErrorOptions {
  stage?: Stage;
  entity?: string;
  cause?: unknown;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return String(error);
  } catch {
    return 'Failed to get error details';
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export abstract class LauncherError extends Error {
  abstract readonly kind: string;
  readonly stage?: Stage;
  readonly entity?: string;
  readonly timestamp: string;

  constructor(message: string, options: LauncherErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.stage = options.stage;
    this.entity = options.entity;
    this.timestamp = new Date().toISOString();
  }

  toContext(): ErrorContext {
    return {
      stage: this.stage,
      timestamp: this.timestamp,
      entity: this.entity,
      cause: this.cause === undefined ? undefined : getErrorMessage(this.cause),
    };
  }
}

/** A git or resource gate refused to let the run proceed. */
export class ValidationError extends LauncherError {
  readonly kind = 'validation';

  constructor(
    message: string,
    readonly violations: string[],
    options: LauncherErrorOptions = {},
  ) {
    super(message, options);
  }
}

/** The supervised task crashed, exited non-zero or timed out. */
export class TaskError extends LauncherError {
  readonly kind = 'task';

  constructor(
    message: string,
    readonly exitCode: number | null,
    readonly timedOut: boolean,
    options: LauncherErrorOptions = {},
  ) {
    super(message, options);
  }
}

export interface FieldIssue {
  path: string;
  message: string;
}

/** Raw task output could not be mapped onto the target schema. */
export class MappingError extends LauncherError {
  readonly kind = 'mapping';

  constructor(
    readonly fields: FieldIssue[],
    options: LauncherErrorOptions = {},
  ) {
    super(
      `Session output failed schema validation: ${fields
        .map((field) => `${field.path || '<root>'} (${field.message})`)
        .join(', ')}`,
      options,
    );
  }
}

export class TransferError extends LauncherError {
  readonly kind = 'transfer';

  constructor(
    message: string,
    readonly transient: boolean,
    options: LauncherErrorOptions = {},
  ) {
    super(message, options);
  }
}

export type AbortReason = 'operator' | 'resource';

export class AbortError extends LauncherError {
  readonly kind = 'abort';

  constructor(
    readonly reason: AbortReason,
    message = reason === 'operator'
      ? 'Run aborted by operator.'
      : 'Run aborted after a resource threshold breach.',
    options: LauncherErrorOptions = {},
  ) {
    super(message, options);
  }
}

/** The AbortError a signal was aborted with, or an operator abort. */
export function abortErrorFromSignal(signal: AbortSignal): AbortError {
  return signal.reason instanceof AbortError
    ? signal.reason
    : new AbortError('operator');
}

/** A decision point could not be resolved (no default in headless mode). */
export class PickerError extends LauncherError {
  readonly kind = 'picker';

  constructor(
    readonly decisionId: string,
    message: string,
  ) {
    super(message, { entity: decisionId });
  }
}

export class FatalConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FatalConfigError';
  }
}

export function toErrorContext(error: unknown, stage?: Stage): ErrorContext {
  if (error instanceof LauncherError) {
    const context = error.toContext();
    return { ...context, stage: context.stage ?? stage };
  }
  return {
    stage,
    timestamp: new Date().toISOString(),
    cause: getErrorMessage(error),
  };
}
