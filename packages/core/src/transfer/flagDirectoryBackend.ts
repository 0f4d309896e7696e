/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'node:path';
import { writeJsonAtomic } from '../utils/atomicFile.js';
import { debugLogger } from '../utils/debugLogger.js';
import { TransferError } from '../utils/errors.js';
import { Stage } from '../session/types.js';
import { toTransferError } from './classify.js';
import type {
  Credentials,
  NotificationReceipt,
  TransferBackend,
  TransferNotification,
} from './types.js';

export interface FlagDirectoryOptions {
  /** Directory watched by the downstream ingestion service. */
  flagDirectory: string;
  projectName: string;
  /** Local time of day (`HH:MM`) the downstream upload should run. */
  scheduleTime?: string;
  /** When set, `projectName` must be one of these. */
  allowedProjects?: readonly string[];
}

export interface FlagManifest {
  name: string;
  sessionId: string;
  projectName: string;
  scheduleTime: string;
  destination: string;
  principal: string | null;
  files: TransferNotification['jobs'];
  schema: { name: string; version: string } | null;
  createdAt: string;
}

export class FlagDirectoryBackend implements TransferBackend {
  readonly name = 'flag-directory';

  constructor(private readonly options: FlagDirectoryOptions) {}

  async notify(
    notification: TransferNotification,
    credentials: Credentials | null,
  ): Promise<NotificationReceipt> {
    const { allowedProjects, projectName } = this.options;
    if (allowedProjects && !allowedProjects.includes(projectName)) {
      throw new TransferError(
        `Project "${projectName}" is not one of: ${allowedProjects.join(', ')}.`,
        false,
        { stage: Stage.TRANSFER_DATA, entity: projectName },
      );
    }

    const name = `${notification.sessionId}.manifest.json`;
    const manifest: FlagManifest = {
      name,
      sessionId: notification.sessionId,
      projectName,
      scheduleTime: this.options.scheduleTime ?? '20:00',
      destination: notification.destination,
      principal: credentials?.principal ?? null,
      files: notification.jobs,
      schema: notification.schemaRecord
        ? {
            name: notification.schemaRecord.schemaName,
            version: notification.schemaRecord.schemaVersion,
          }
        : null,
      createdAt: new Date().toISOString(),
    };

    const manifestPath = path.join(this.options.flagDirectory, name);
    try {
      await writeJsonAtomic(manifestPath, manifest);
    } catch (error) {
      throw toTransferError(error, manifestPath);
    }
    debugLogger.log(`[transfer] Flag manifest written to ${manifestPath}`);
    return { receipt: manifestPath };
  }
}
