/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { z } from 'zod';
import type { Session } from '../session/types.js';
import type { GitState } from '../git/types.js';
import type { EnvironmentSnapshot } from '../environment/snapshot.js';

export type SchemaFields = Record<string, unknown>;

/** Everything the mapper may read besides the raw task output. */
export interface MappingContext {
  session: Readonly<Session>;
  gitState: GitState | null;
  environment: EnvironmentSnapshot | null;
  taskProfile: string | null;
}

export interface SchemaProvenance {
  operator: string;
  subject: string;
  rigId: string;
  commit: string | null;
  branch: string | null;
  versionTag: string | null;
  taskProfile: string | null;
  environment: EnvironmentSnapshot | null;
}

export interface SchemaRecord<TFields extends SchemaFields = SchemaFields> {
  schemaName: string;
  schemaVersion: string;
  sessionId: string;
  fields: TFields;
  provenance: SchemaProvenance;
  mappedAt: string;
}

/**
 * Supplies a target schema. `project` only shapes a candidate from the raw
 * output; validation against `schema` is done by the DataMapper.
 */
export interface SchemaMapper<TFields extends SchemaFields = SchemaFields> {
  readonly schemaName: string;
  readonly schemaVersion: string;
  readonly schema: z.ZodType<TFields, z.ZodTypeDef, unknown>;
  project(raw: unknown, context: MappingContext): unknown;
}
