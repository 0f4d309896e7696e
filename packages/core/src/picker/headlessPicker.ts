/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { debugLogger } from '../utils/debugLogger.js';
import { PickerError } from '../utils/errors.js';
import type {
  ConfirmRequest,
  DecisionRequest,
  HeadlessDefaults,
  InputTextRequest,
  Picker,
  PickOneRequest,
  PickOption,
  TextValidator,
} from './types.js';

/**
 * Resolves every decision from configured defaults. A decision without a
 * usable default fails immediately; it never blocks waiting for input.
 */
export class HeadlessPicker implements Picker {
  readonly kind = 'headless';

  constructor(private readonly defaults: HeadlessDefaults = {}) {}

  async confirm(request: ConfirmRequest): Promise<boolean> {
    const value = this.lookup(request);
    if (typeof value === 'boolean') {
      return this.resolved(request, value);
    }
    const normalized = value.trim().toLowerCase();
    if (normalized === 'yes' || normalized === 'true') {
      return this.resolved(request, true);
    }
    if (normalized === 'no' || normalized === 'false') {
      return this.resolved(request, false);
    }
    throw new PickerError(
      request.id,
      `Default for "${request.id}" must be a boolean, got "${value}".`,
    );
  }

  async pickOne<T>(request: PickOneRequest<T>): Promise<PickOption<T>> {
    const value = String(this.lookup(request));
    const option = request.options.find((candidate) => candidate.key === value);
    if (!option) {
      throw new PickerError(
        request.id,
        `Default "${value}" for "${request.id}" is not one of: ${request.options
          .map((candidate) => candidate.key)
          .join(', ')}.`,
      );
    }
    return this.resolved(request, option);
  }

  async inputText(
    request: InputTextRequest,
    validator?: TextValidator,
  ): Promise<string> {
    const value = String(this.lookup(request));
    const problem = validator?.(value) ?? null;
    if (problem !== null) {
      throw new PickerError(
        request.id,
        `Default for "${request.id}" is invalid: ${problem}`,
      );
    }
    return this.resolved(request, value);
  }

  private lookup(request: DecisionRequest): string | boolean {
    const value = this.defaults[request.id];
    if (value === undefined) {
      throw new PickerError(
        request.id,
        `No headless default configured for "${request.id}" (${request.message}).`,
      );
    }
    return value;
  }

  private resolved<V>(request: DecisionRequest, value: V): V {
    debugLogger.debug(`[picker] ${request.id} resolved headlessly`);
    return value;
  }
}
