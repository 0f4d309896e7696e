/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Stage, type StageRecord, type TerminalStage } from './types.js';

export const CANONICAL_STAGE_ORDER: readonly Stage[] = [
  Stage.INIT,
  Stage.VALIDATE_ENV,
  Stage.RUN_TASK,
  Stage.MAP_METADATA,
  Stage.TRANSFER_DATA,
  Stage.DONE,
];

const TERMINAL_STAGES: ReadonlySet<Stage> = new Set([
  Stage.DONE,
  Stage.FAILED,
  Stage.ABORTED,
  Stage.PARTIAL,
]);

export function isTerminalStage(stage: Stage): stage is TerminalStage {
  return TERMINAL_STAGES.has(stage);
}

function canonicalIndex(stage: Stage): number {
  return CANONICAL_STAGE_ORDER.indexOf(stage);
}

/** Sessions that may run another transfer pass after they ended. */
const RECOVERABLE_STAGES: ReadonlySet<Stage> = new Set([
  Stage.PARTIAL,
  Stage.ABORTED,
]);

/**
 * A session may move forward one canonical stage at a time, stay on the
 * current stage (another record for it), or jump to any terminal stage.
 * The only way out of a terminal stage is a recovery pass from PARTIAL or
 * ABORTED back into TRANSFER_DATA.
 */
export function canTransition(from: Stage, to: Stage): boolean {
  if (isTerminalStage(from)) {
    return RECOVERABLE_STAGES.has(from) && to === Stage.TRANSFER_DATA;
  }
  if (isTerminalStage(to)) {
    return true;
  }
  const fromIndex = canonicalIndex(from);
  const toIndex = canonicalIndex(to);
  return toIndex === fromIndex || toIndex === fromIndex + 1;
}

/**
 * Checks a recorded history: it starts at INIT, every step is a legal
 * transition and it ends on a terminal stage. Earlier terminal stages are
 * only those a recovery pass resumed from.
 */
export function isWellFormedHistory(history: StageRecord[]): boolean {
  const stages = history.map((record) => record.stage);
  const [first] = stages;
  const last = stages.at(-1);
  if (first !== Stage.INIT || last === undefined || !isTerminalStage(last)) {
    return false;
  }
  let current: Stage = first;
  for (const stage of stages.slice(1)) {
    if (!canTransition(current, stage)) {
      return false;
    }
    current = stage;
  }
  return true;
}
