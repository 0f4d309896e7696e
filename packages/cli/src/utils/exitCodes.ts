/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Stage, type ResumeResult, type SessionResult } from '@experiment-launcher/core';

export const ExitCode = {
  SUCCESS: 0,
  VALIDATION: 1,
  TASK: 2,
  PARTIAL: 3,
  ABORTED: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

const TASK_FAILURE_KINDS: ReadonlySet<string> = new Set(['task', 'mapping']);

export function exitCodeForSession(result: SessionResult): ExitCode {
  switch (result.finalStage) {
    case Stage.DONE:
      return ExitCode.SUCCESS;
    case Stage.PARTIAL:
      return ExitCode.PARTIAL;
    case Stage.ABORTED:
      return result.abortReason === 'resource'
        ? ExitCode.VALIDATION
        : ExitCode.ABORTED;
    case Stage.FAILED:
      return result.error && TASK_FAILURE_KINDS.has(result.error.kind)
        ? ExitCode.TASK
        : ExitCode.VALIDATION;
    default: {
      const exhaustive: never = result.finalStage;
      throw new Error(`Unknown terminal stage: ${String(exhaustive)}`);
    }
  }
}

export function exitCodeForResume(result: ResumeResult): ExitCode {
  if (result.aborted) {
    return ExitCode.ABORTED;
  }
  return result.complete ? ExitCode.SUCCESS : ExitCode.PARTIAL;
}
