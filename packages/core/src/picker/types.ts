/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Stable identifiers for every operator decision the launcher can ask for.
 * Headless defaults are keyed by these.
 */
export const DecisionId = {
  OPERATOR: 'session.operator',
  SUBJECT: 'session.subject',
  GIT_RESET: 'git.reset',
  TASK_PROFILE: 'task.profile',
  MAPPING_RETRY: 'mapping.retry',
  TRANSFER_CONFIRM: 'transfer.confirm',
} as const;

export type DecisionId = (typeof DecisionId)[keyof typeof DecisionId];

export interface DecisionRequest {
  id: DecisionId;
  message: string;
}

export interface ConfirmRequest extends DecisionRequest {
  /** Answer highlighted first in interactive mode. */
  defaultValue?: boolean;
}

export interface PickOption<T> {
  key: string;
  label: string;
  value: T;
  description?: string;
}

export interface PickOneRequest<T> extends DecisionRequest {
  options: ReadonlyArray<PickOption<T>>;
}

export interface InputTextRequest extends DecisionRequest {
  placeholder?: string;
}

/** Returns an error message, or `null` when the value is acceptable. */
export type TextValidator = (value: string) => string | null;

/** Operator decision capability. The launcher only calls these. */
export interface Picker {
  readonly kind: 'interactive' | 'headless';
  confirm(request: ConfirmRequest): Promise<boolean>;
  pickOne<T>(request: PickOneRequest<T>): Promise<PickOption<T>>;
  inputText(request: InputTextRequest, validator?: TextValidator): Promise<string>;
}

export type HeadlessDefaults = Partial<Record<DecisionId, string | boolean>>;
