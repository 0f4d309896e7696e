/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { debugLogger } from '../utils/debugLogger.js';
import { getErrorMessage, ValidationError } from '../utils/errors.js';
import { Stage } from '../session/types.js';
import { applyGitPolicy, evaluateVersionConstraint } from './versionPolicy.js';
import type {
  GitFileChange,
  GitPolicy,
  GitState,
  VersionConstraint,
} from './types.js';

const execFileAsync = promisify(execFile);

/**
 * Parses `git status --porcelain -z`. Entries are `XY PATH\0`; renames and
 * copies carry a second `ORIG_PATH\0` that is skipped.
 */
export function parsePorcelainStatus(porcelain: string): GitFileChange[] {
  const changes: GitFileChange[] = [];
  let i = 0;
  while (i < porcelain.length) {
    const stagedStatus = porcelain.charAt(i);
    const unstagedStatus = porcelain.charAt(i + 1);
    const pathStart = i + 3;
    const nullIndex = porcelain.indexOf('\0', pathStart);
    if (nullIndex === -1) {
      break;
    }
    changes.push({
      path: porcelain.substring(pathStart, nullIndex),
      stagedStatus,
      unstagedStatus,
    });
    i = nullIndex + 1;

    if (stagedStatus === 'R' || stagedStatus === 'C') {
      const origEnd = porcelain.indexOf('\0', i);
      i = origEnd === -1 ? porcelain.length : origEnd + 1;
    }
  }
  return changes;
}

export interface GitValidateOptions {
  constraint?: VersionConstraint;
}

export class GitManager {
  private readonly env: NodeJS.ProcessEnv;

  constructor(private readonly gitBinary = 'git') {
    this.env = { ...process.env, GIT_OPTIONAL_LOCKS: '0', LC_ALL: 'C' };
  }

  /**
   * Inspects the repository once and applies `policy`. Throws
   * `ValidationError` when the policy fails; otherwise returns the state
   * with any tolerated violations recorded.
   */
  async validate(
    repoPath: string,
    policy: GitPolicy,
    options: GitValidateOptions = {},
  ): Promise<GitState> {
    const state = await this.inspect(
      repoPath,
      policy,
      options.constraint ?? { kind: 'none' },
    );
    const verdict = applyGitPolicy(policy, {
      dirty: state.dirty,
      uncommittedCount: state.uncommitted.length,
      version: state.version,
    });
    state.violations = verdict.violations;

    if (!verdict.passed) {
      throw new GitValidationError(
        `Repository ${repoPath} failed the ${policy} policy: ${verdict.violations.join('; ')}`,
        verdict.violations,
        state,
      );
    }
    if (verdict.violations.length > 0) {
      debugLogger.warn(
        `[git] ${policy} policy tolerated: ${verdict.violations.join('; ')}`,
      );
    }
    return state;
  }

  /** Discards tracked changes and removes untracked files. */
  async resetWorkingTree(repoPath: string): Promise<void> {
    debugLogger.warn(`[git] Resetting working tree at ${repoPath}`);
    await this.git(repoPath, ['reset', '--hard', 'HEAD']);
    await this.git(repoPath, ['clean', '-fd']);
    await this.git(repoPath, [
      'submodule',
      'foreach',
      '--recursive',
      'git reset --hard && git clean -fd',
    ]);
  }

  private async inspect(
    repoPath: string,
    policy: GitPolicy,
    constraint: VersionConstraint,
  ): Promise<GitState> {
    let commit: string;
    try {
      commit = (await this.git(repoPath, ['rev-parse', 'HEAD'])).trim();
    } catch (error) {
      throw new ValidationError(
        `${repoPath} is not a readable git repository.`,
        [getErrorMessage(error)],
        { stage: Stage.VALIDATE_ENV, entity: repoPath, cause: error },
      );
    }

    const [branchOut, porcelain, tagsOut] = await Promise.all([
      this.git(repoPath, ['branch', '--show-current']),
      this.git(repoPath, [
        'status',
        '--porcelain',
        '-z',
        '--untracked-files=all',
        '--ignore-submodules=none',
      ]),
      this.git(repoPath, ['tag', '--points-at', 'HEAD']),
    ]);

    const uncommitted = parsePorcelainStatus(porcelain);
    const tags = tagsOut
      .split('\n')
      .map((tag) => tag.trim())
      .filter((tag) => tag !== '');
    const branch = branchOut.trim();

    debugLogger.debug(
      `[git] ${repoPath} at ${commit} (${branch || 'detached'}), ${uncommitted.length} change(s), tags: ${tags.join(', ') || 'none'}`,
    );

    return {
      repoPath,
      commit,
      branch: branch === '' ? null : branch,
      dirty: uncommitted.length > 0,
      uncommitted,
      tags,
      version: evaluateVersionConstraint(tags, constraint),
      policy,
      violations: [],
      checkedAt: new Date().toISOString(),
    };
  }

  private async git(cwd: string, args: string[]): Promise<string> {
    const { stdout } = await execFileAsync(this.gitBinary, args, {
      cwd,
      env: this.env,
      maxBuffer: 10 * 1024 * 1024,
    });
    return stdout;
  }
}

/** Carries the inspected state so callers can offer a reset. */
export class GitValidationError extends ValidationError {
  constructor(
    message: string,
    violations: string[],
    readonly state: GitState,
  ) {
    super(message, violations, {
      stage: Stage.VALIDATE_ENV,
      entity: state.repoPath,
    });
  }
}
