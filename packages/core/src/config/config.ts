/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as os from 'node:os';
import { z } from 'zod';
import { FatalConfigError } from '../utils/errors.js';
import { DecisionId } from '../picker/types.js';
import { Stage } from '../session/types.js';

const DECISION_IDS = [
  DecisionId.OPERATOR,
  DecisionId.SUBJECT,
  DecisionId.GIT_RESET,
  DecisionId.TASK_PROFILE,
  DecisionId.MAPPING_RETRY,
  DecisionId.TRANSFER_CONFIRM,
] as const;

const OPTIONAL_STAGES = [
  Stage.VALIDATE_ENV,
  Stage.RUN_TASK,
  Stage.MAP_METADATA,
  Stage.TRANSFER_DATA,
] as const;

export type OptionalStage = (typeof OPTIONAL_STAGES)[number];

/** Operator and subject names become path segments under the data root. */
export const NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
export const NAME_PATTERN_MESSAGE =
  'use letters, digits, ".", "_" or "-", starting with a letter or digit';

const nameSchema = z.string().regex(NAME_PATTERN, NAME_PATTERN_MESSAGE);

const bytes = z.number().int().nonnegative();

const thresholdsSchema = z
  .object({
    minFreeDiskBytes: bytes.optional(),
    minFreeDestinationDiskBytes: bytes.optional(),
    minFreeMemoryBytes: bytes.optional(),
    maxLoadAverage: z.number().positive().optional(),
  })
  .strict();

const taskProfileSchema = z.object({
  name: z.string().min(1),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.string().min(1).optional(),
  env: z.record(z.string()).default({}),
});

export const runConfigSchema = z
  .object({
    operator: nameSchema.optional(),
    subject: nameSchema.optional(),
    rigId: z
      .string()
      .min(1)
      .default(() => os.hostname()),
    /** Root under which one directory per session is created. */
    dataDir: z.string().min(1),
    debug: z.boolean().default(false),
    repository: z
      .object({
        path: z.string().min(1).default('.'),
        policy: z.enum(['strict', 'force', 'version-only']).default('strict'),
        versionConstraint: z.string().min(1).optional(),
        offerReset: z.boolean().default(true),
      })
      .default({}),
    resources: z
      .object({
        preTask: thresholdsSchema.default({}),
        preTransfer: thresholdsSchema.default({}),
        monitor: thresholdsSchema
          .extend({ intervalMs: z.number().int().positive().default(5000) })
          .default({}),
      })
      .default({}),
    task: z.object({
      profiles: z.array(taskProfileSchema).min(1),
      profile: z.string().min(1).optional(),
      timeoutMs: z.number().int().positive().optional(),
      pollIntervalMs: z.number().int().positive().default(1000),
      killGraceMs: z.number().int().nonnegative().default(5000),
      /** JSON file the task writes into the session directory. */
      outputFile: z.string().min(1).default('session_output.json'),
    }),
    mapping: z
      .object({
        onError: z.enum(['fail', 'remediate']).default('fail'),
        maxRemediationAttempts: z.number().int().nonnegative().default(1),
      })
      .default({}),
    transfer: z.object({
      destination: z.string().min(1),
      workers: z.number().int().positive().default(4),
      fingerprint: z.enum(['sha256', 'size-mtime']).default('sha256'),
      retry: z
        .object({
          maxAttempts: z.number().int().positive().default(5),
          initialDelayMs: z.number().int().nonnegative().default(1000),
          maxDelayMs: z.number().int().nonnegative().default(30000),
          jitter: z.number().min(0).max(1).default(0.3),
        })
        .default({}),
      confirm: z.boolean().default(false),
      flagDirectory: z.string().min(1).optional(),
      projectName: z.string().min(1).optional(),
      scheduleTime: z
        .string()
        .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM')
        .optional(),
      allowedProjects: z.array(z.string().min(1)).optional(),
    }),
    stages: z
      .object({
        optional: z.array(z.enum(OPTIONAL_STAGES)).default([]),
      })
      .default({}),
    picker: z
      .object({
        mode: z.enum(['interactive', 'headless']).default('interactive'),
        defaults: z
          .record(z.enum(DECISION_IDS), z.union([z.string(), z.boolean()]))
          .default({}),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    const names = config.task.profiles.map((profile) => profile.name);
    if (config.task.profile !== undefined && !names.includes(config.task.profile)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['task', 'profile'],
        message: `unknown profile "${config.task.profile}" (known: ${names.join(', ')})`,
      });
    }
    if (new Set(names).size !== names.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['task', 'profiles'],
        message: 'profile names must be unique',
      });
    }
    if (config.transfer.flagDirectory !== undefined && !config.transfer.projectName) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['transfer', 'projectName'],
        message: 'required when transfer.flagDirectory is set',
      });
    }
    if (config.transfer.retry.maxDelayMs < config.transfer.retry.initialDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['transfer', 'retry', 'maxDelayMs'],
        message: 'must not be smaller than initialDelayMs',
      });
    }
  });

export type RunConfig = z.output<typeof runConfigSchema>;
export type RunConfigInput = z.input<typeof runConfigSchema>;
export type TaskProfile = RunConfig['task']['profiles'][number];

/** Validates and fills defaults. Throws FatalConfigError listing every problem. */
export function parseRunConfig(input: unknown): RunConfig {
  const result = runConfigSchema.safeParse(input);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `  - ${issue.path.join('.') || '<root>'}: ${issue.message}`,
    );
    throw new FatalConfigError(`Invalid configuration:\n${problems.join('\n')}`);
  }
  return result.data;
}
