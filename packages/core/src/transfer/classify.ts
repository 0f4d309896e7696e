/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { getErrorMessage, isNodeError, TransferError } from '../utils/errors.js';
import { Stage } from '../session/types.js';

export type FailureKind = 'transient' | 'permanent';

const TRANSIENT_CODES: ReadonlySet<string> = new Set([
  'EBUSY',
  'EAGAIN',
  'EMFILE',
  'ENFILE',
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'EPIPE',
  'EAI_AGAIN',
]);

/**
 * Anything not known to be transient is permanent: retrying an unknown
 * failure can mask a misconfigured destination.
 */
export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof TransferError) {
    return error.transient ? 'transient' : 'permanent';
  }
  if (isNodeError(error) && error.code !== undefined && TRANSIENT_CODES.has(error.code)) {
    return 'transient';
  }
  return 'permanent';
}

export function isTransientFailure(error: unknown): boolean {
  return classifyFailure(error) === 'transient';
}

/** Wraps any copy or notification failure in a classified TransferError. */
export function toTransferError(error: unknown, entity: string): TransferError {
  if (error instanceof TransferError) {
    return error;
  }
  return new TransferError(
    getErrorMessage(error),
    isTransientFailure(error),
    { stage: Stage.TRANSFER_DATA, entity, cause: error },
  );
}
