/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import semver from 'semver';
import type {
  GitPolicy,
  VersionCheck,
  VersionConstraint,
} from './types.js';

const TAG_PREFIX = 'tag:';

/**
 * Reads a configured constraint string. `tag:<name>` pins an exact tag, a
 * valid semver range constrains the tagged versions, and anything else is
 * treated as an exact tag name.
 */
export function parseVersionConstraint(input: string | undefined): VersionConstraint {
  const value = input?.trim() ?? '';
  if (value === '') {
    return { kind: 'none' };
  }
  if (value.startsWith(TAG_PREFIX)) {
    return { kind: 'tag', tag: value.slice(TAG_PREFIX.length) };
  }
  if (semver.validRange(value) !== null) {
    return { kind: 'semver', range: value };
  }
  return { kind: 'tag', tag: value };
}

type Rule<K extends VersionConstraint['kind']> = (
  tags: readonly string[],
  constraint: Extract<VersionConstraint, { kind: K }>,
) => VersionCheck;

const VERSION_RULES: { [K in VersionConstraint['kind']]: Rule<K> } = {
  none: (_tags, constraint) => ({
    constraint,
    satisfied: true,
    matchedBy: null,
    reason: 'no version constraint configured',
  }),

  tag: (tags, constraint) => {
    const satisfied = tags.includes(constraint.tag);
    return {
      constraint,
      satisfied,
      matchedBy: satisfied ? constraint.tag : null,
      reason: satisfied
        ? `HEAD is tagged ${constraint.tag}`
        : `HEAD is not tagged ${constraint.tag} (tags: ${formatTags(tags)})`,
    };
  },

  semver: (tags, constraint) => {
    const versions = tags
      .map((tag) => ({ tag, version: semver.clean(tag) }))
      .filter(
        (entry): entry is { tag: string; version: string } =>
          entry.version !== null,
      )
      .sort((a, b) => semver.rcompare(a.version, b.version));
    const match = versions.find((entry) =>
      semver.satisfies(entry.version, constraint.range),
    );
    if (match) {
      return {
        constraint,
        satisfied: true,
        matchedBy: match.tag,
        reason: `${match.tag} satisfies ${constraint.range}`,
      };
    }
    return {
      constraint,
      satisfied: false,
      matchedBy: null,
      reason:
        versions.length === 0
          ? `HEAD has no version tag to check against ${constraint.range}`
          : `no tag at HEAD satisfies ${constraint.range} (tags: ${formatTags(tags)})`,
    };
  },
};

function formatTags(tags: readonly string[]): string {
  return tags.length > 0 ? tags.join(', ') : 'none';
}

export function evaluateVersionConstraint(
  tags: readonly string[],
  constraint: VersionConstraint,
): VersionCheck {
  switch (constraint.kind) {
    case 'none':
      return VERSION_RULES.none(tags, constraint);
    case 'tag':
      return VERSION_RULES.tag(tags, constraint);
    case 'semver':
      return VERSION_RULES.semver(tags, constraint);
    default: {
      const exhaustive: never = constraint;
      throw new Error(`Unknown constraint: ${JSON.stringify(exhaustive)}`);
    }
  }
}

export interface PolicyVerdict {
  passed: boolean;
  violations: string[];
}

/**
 * Applies a git policy to the observed repository facts. Violations are
 * always reported; only the policy decides whether they fail the gate.
 */
export function applyGitPolicy(
  policy: GitPolicy,
  facts: { dirty: boolean; uncommittedCount: number; version: VersionCheck },
): PolicyVerdict {
  const dirtyViolation = facts.dirty
    ? [`working tree has ${facts.uncommittedCount} uncommitted change(s)`]
    : [];
  const versionViolation = facts.version.satisfied ? [] : [facts.version.reason];

  switch (policy) {
    case 'strict': {
      const violations = [...dirtyViolation, ...versionViolation];
      return { passed: violations.length === 0, violations };
    }
    case 'version-only':
      return {
        passed: versionViolation.length === 0,
        violations: [...dirtyViolation, ...versionViolation],
      };
    case 'force':
      return {
        passed: true,
        violations: [...dirtyViolation, ...versionViolation],
      };
    default: {
      const exhaustive: never = policy;
      throw new Error(`Unknown git policy: ${String(exhaustive)}`);
    }
  }
}
