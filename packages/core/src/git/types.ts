/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type GitPolicy = 'strict' | 'force' | 'version-only';

export type VersionConstraint =
  | { kind: 'none' }
  | { kind: 'tag'; tag: string }
  | { kind: 'semver'; range: string };

export interface VersionCheck {
  constraint: VersionConstraint;
  satisfied: boolean;
  /** The tag or version that satisfied the constraint, if any. */
  matchedBy: string | null;
  reason: string;
}

export interface GitFileChange {
  path: string;
  stagedStatus: string;
  unstagedStatus: string;
}

export interface GitState {
  repoPath: string;
  commit: string;
  branch: string | null;
  dirty: boolean;
  uncommitted: GitFileChange[];
  tags: string[];
  version: VersionCheck;
  policy: GitPolicy;
  /** Policy violations observed; under `force` these did not fail the gate. */
  violations: string[];
  checkedAt: string;
}
