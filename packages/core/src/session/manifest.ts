/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'node:path';
import { readJsonFile, SerialFileWriter } from '../utils/atomicFile.js';
import { canTransition } from './stageMachine.js';
import type { Session, StageRecord } from './types.js';
import type { GitState } from '../git/types.js';
import type { ResourceSnapshot } from '../resources/types.js';
import type { EnvironmentSnapshot } from '../environment/snapshot.js';
import type { SchemaRecord } from '../mapper/types.js';

export const MANIFEST_FILENAME = 'session.manifest.json';
export const MANIFEST_VERSION = 1;

export interface SessionManifest {
  manifestVersion: number;
  session: Session;
  history: StageRecord[];
  gitState: GitState | null;
  resourceSnapshots: ResourceSnapshot[];
  environment: EnvironmentSnapshot | null;
  schemaRecord: SchemaRecord | null;
  ledgerPath: string | null;
}

/**
 * Owns the persisted session manifest. Every mutation rewrites the whole
 * document atomically and resolves only once it is on disk.
 */
export class ManifestStore {
  private readonly writer: SerialFileWriter;
  private readonly manifest: SessionManifest;

  /** Starts a new manifest for `session`, or continues `existing`. */
  constructor(session: Session, existing?: SessionManifest) {
    this.writer = new SerialFileWriter(
      path.join(session.directory, MANIFEST_FILENAME),
    );
    this.manifest = existing
      ? { ...structuredClone(existing), session: { ...session } }
      : {
          manifestVersion: MANIFEST_VERSION,
          session: { ...session },
          history: [],
          gitState: null,
          resourceSnapshots: [],
          environment: null,
          schemaRecord: null,
          ledgerPath: null,
        };
  }

  /**
   * Reopens the manifest of an ended session so a recovery pass can append
   * to its history. The session directory is taken from where it was found.
   */
  static async open(sessionDirectory: string): Promise<ManifestStore | null> {
    const existing = await ManifestStore.load(sessionDirectory);
    if (!existing) {
      return null;
    }
    return new ManifestStore(
      { ...existing.session, directory: sessionDirectory },
      existing,
    );
  }

  get filePath(): string {
    return this.writer.filePath;
  }

  get history(): readonly StageRecord[] {
    return this.manifest.history;
  }

  async appendStage(session: Session, record: StageRecord): Promise<void> {
    const previous = this.manifest.history.at(-1);
    if (previous && !canTransition(previous.stage, record.stage)) {
      throw new Error(
        `Illegal stage transition ${previous.stage} -> ${record.stage}`,
      );
    }
    this.manifest.history.push(record);
    this.manifest.session = { ...session };
    await this.persist();
  }

  async update(
    patch: Partial<
      Pick<
        SessionManifest,
        'gitState' | 'environment' | 'schemaRecord' | 'ledgerPath'
      >
    >,
  ): Promise<void> {
    Object.assign(this.manifest, patch);
    await this.persist();
  }

  async addResourceSnapshot(snapshot: ResourceSnapshot): Promise<void> {
    this.manifest.resourceSnapshots.push(snapshot);
    await this.persist();
  }

  snapshot(): SessionManifest {
    return structuredClone(this.manifest);
  }

  private persist(): Promise<void> {
    return this.writer.write(this.manifest);
  }

  static async load(sessionDirectory: string): Promise<SessionManifest | null> {
    const raw = await readJsonFile(path.join(sessionDirectory, MANIFEST_FILENAME));
    if (raw === null) {
      return null;
    }
    if (!isSessionManifest(raw)) {
      throw new Error(
        `${path.join(sessionDirectory, MANIFEST_FILENAME)} is not a session manifest.`,
      );
    }
    return raw;
  }
}

function isSessionManifest(value: unknown): value is SessionManifest {
  return (
    typeof value === 'object' &&
    value !== null &&
    'manifestVersion' in value &&
    value.manifestVersion === MANIFEST_VERSION &&
    'session' in value &&
    'history' in value &&
    Array.isArray(value.history)
  );
}
