/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { z } from 'zod';
import { MappingError, type FieldIssue } from '../utils/errors.js';
import { Stage } from '../session/types.js';
import type {
  MappingContext,
  SchemaFields,
  SchemaMapper,
  SchemaProvenance,
  SchemaRecord,
} from './types.js';

export function toFieldIssues(error: z.ZodError): FieldIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

function provenanceOf(context: MappingContext): SchemaProvenance {
  return {
    operator: context.session.operator,
    subject: context.session.subject,
    rigId: context.session.rigId,
    commit: context.gitState?.commit ?? null,
    branch: context.gitState?.branch ?? null,
    versionTag: context.gitState?.version.matchedBy ?? null,
    taskProfile: context.taskProfile,
    environment: context.environment,
  };
}

/**
 * Turns raw task output into a validated SchemaRecord. Performs no I/O;
 * the only input besides its arguments is the clock behind `mappedAt`.
 */
export class DataMapper<TFields extends SchemaFields = SchemaFields> {
  constructor(
    private readonly mapper: SchemaMapper<TFields>,
    private readonly now: () => Date = () => new Date(),
  ) {}

  map(raw: unknown, context: MappingContext): SchemaRecord<TFields> {
    const candidate = this.mapper.project(raw, context);
    const result = this.mapper.schema.safeParse(candidate);
    if (!result.success) {
      throw new MappingError(toFieldIssues(result.error), {
        stage: Stage.MAP_METADATA,
        entity: `${this.mapper.schemaName}@${this.mapper.schemaVersion}`,
      });
    }
    return {
      schemaName: this.mapper.schemaName,
      schemaVersion: this.mapper.schemaVersion,
      sessionId: context.session.id,
      fields: result.data,
      provenance: provenanceOf(context),
      mappedAt: this.now().toISOString(),
    };
  }
}
