/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import type { MappingContext, SchemaMapper } from './types.js';

const isoTimestamp = z.string().datetime({ offset: true });

export const jsonSessionSchema = z
  .object({
    subject: z.string().min(1),
    experimenters: z.array(z.string().min(1)).min(1),
    sessionStart: isoTimestamp,
    sessionEnd: isoTimestamp,
    taskName: z.string().min(1),
    taskVersion: z.string().min(1),
    notes: z.string().optional(),
    metrics: z.record(z.number()).optional(),
  })
  .superRefine((value, ctx) => {
    if (Date.parse(value.sessionEnd) < Date.parse(value.sessionStart)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sessionEnd'],
        message: 'must not be earlier than sessionStart',
      });
    }
  });

export type JsonSessionFields = z.infer<typeof jsonSessionSchema>;

function asObject(raw: unknown): Record<string, unknown> {
  if (typeof raw === 'object' && raw !== null && !Array.isArray(raw)) {
    return Object.fromEntries(Object.entries(raw));
  }
  return {};
}

/**
 * Reference mapper for tasks that write a flat JSON summary. Subject,
 * experimenters and start time fall back to the session when the task
 * leaves them out.
 */
export function createJsonSessionSchemaMapper(): SchemaMapper<JsonSessionFields> {
  return {
    schemaName: 'json-session',
    schemaVersion: '1.0.0',
    schema: jsonSessionSchema,
    project(raw: unknown, context: MappingContext) {
      const output = asObject(raw);
      return {
        ...output,
        subject: output['subject'] ?? context.session.subject,
        experimenters: output['experimenters'] ?? [context.session.operator],
        sessionStart: output['sessionStart'] ?? context.session.startedAt,
      };
    },
  };
}
