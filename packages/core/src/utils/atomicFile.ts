/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { randomUUID } from 'node:crypto';
import { isNodeError } from './errors.js';

/**
 * Writes `data` as pretty JSON next to `filePath` and renames it into place,
 * so readers only ever see the old or the new document.
 */
export async function writeJsonAtomic(
  filePath: string,
  data: unknown,
): Promise<void> {
  await writeTextAtomic(filePath, serialize(data));
}

function serialize(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

async function writeTextAtomic(filePath: string, text: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`;
  try {
    await fs.writeFile(tempPath, text, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/** Returns `null` when the file does not exist. */
export async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    return JSON.parse(content);
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Serializes writes to one file: each call waits for the previous write to
 * settle, so concurrent workers cannot interleave renames out of order.
 */
export class SerialFileWriter {
  private tail: Promise<void> = Promise.resolve();

  constructor(readonly filePath: string) {}

  /** `data` is serialized immediately; later mutations are not picked up. */
  write(data: unknown): Promise<void> {
    const text = serialize(data);
    const next = this.tail.then(() => writeTextAtomic(this.filePath, text));
    // The chain must survive a failed write; the caller still sees the error.
    this.tail = next.catch(() => undefined);
    return next;
  }

  flush(): Promise<void> {
    return this.tail;
  }
}

export interface FileLock {
  readonly lockPath: string;
  release(): Promise<void>;
}

/**
 * Takes an exclusive lock by creating `<target>.lock`. A lock left behind
 * by a process that is no longer alive is reclaimed.
 */
export async function acquireFileLock(target: string): Promise<FileLock> {
  const lockPath = `${target}.lock`;
  await fs.mkdir(path.dirname(lockPath), { recursive: true });

  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      const handle = await fs.open(lockPath, 'wx');
      await handle.writeFile(String(process.pid), 'utf-8');
      await handle.close();
      return {
        lockPath,
        release: () => fs.rm(lockPath, { force: true }),
      };
    } catch (error) {
      if (!isNodeError(error) || error.code !== 'EEXIST') {
        throw error;
      }
      const owner = Number.parseInt(
        await fs.readFile(lockPath, 'utf-8').catch(() => ''),
        10,
      );
      if (Number.isFinite(owner) && isProcessAlive(owner)) {
        throw new Error(`${target} is locked by process ${owner}.`);
      }
      await fs.rm(lockPath, { force: true });
    }
  }
  throw new Error(`Could not acquire lock on ${target}.`);
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return isNodeError(error) && error.code === 'EPERM';
  }
}
