/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  copyPreservingTimes,
  DataTransfer,
  isLedgerComplete,
  summarizeLedger,
  type FileCopier,
} from './dataTransfer.js';
import { buildLedger, LedgerStore, reconcileLedger } from './ledger.js';
import {
  TransferJobState,
  type Ledger,
  type TransferBackend,
} from './types.js';
import { computeFingerprint } from '../utils/fingerprint.js';
import { TransferError } from '../utils/errors.js';

const fastRetry = {
  maxAttempts: 5,
  initialDelayMs: 1,
  maxDelayMs: 5,
  jitter: 0,
};

function errno(code: string, message = code): NodeJS.ErrnoException {
  return Object.assign(new Error(message), { code });
}

describe('DataTransfer', () => {
  let root: string;
  let sourceDir: string;
  let destination: string;

  const writeSource = (relative: string, content: string) => {
    const file = path.join(sourceDir, relative);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  };

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'launcher-transfer-'));
    sourceDir = path.join(root, 'session');
    destination = path.join(root, 'archive', 'session');
    writeSource('behavior/events.csv', 'trial,reward\n1,1\n');
    writeSource('behavior/video.bin', 'frames');
    writeSource('task.stdout.log', 'ok\n');
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('copies every file and confirms it against the source fingerprint', async () => {
    const ledger = await buildLedger('s1', sourceDir, destination, 'sha256');
    const store = LedgerStore.forSession(sourceDir);
    const result = await new DataTransfer({
      workers: 2,
      retry: fastRetry,
      store,
    }).transfer(ledger);

    expect(result.jobs.map((job) => [job.id, job.state])).toEqual([
      ['behavior/events.csv', TransferJobState.CONFIRMED],
      ['behavior/video.bin', TransferJobState.CONFIRMED],
      ['task.stdout.log', TransferJobState.CONFIRMED],
    ]);
    expect(
      fs.readFileSync(path.join(destination, 'behavior', 'events.csv'), 'utf-8'),
    ).toBe('trial,reward\n1,1\n');
    expect(result.notification.state).toBe('SKIPPED');
    expect(isLedgerComplete(result)).toBe(true);

    const persisted = await store.load();
    expect(persisted?.jobs.every((job) => job.state === TransferJobState.CONFIRMED)).toBe(true);
  });

  it('preserves mtimes so size-mtime fingerprints verify', async () => {
    const ledger = await buildLedger('s1', sourceDir, destination, 'size-mtime');
    const result = await new DataTransfer({ workers: 1, retry: fastRetry }).transfer(
      ledger,
    );
    expect(summarizeLedger(result)).toEqual({
      total: 3,
      confirmed: 3,
      failed: 0,
      pending: 0,
    });
  });

  it('confirms a job after three transient failures', async () => {
    const ledger = await buildLedger('s1', sourceDir, destination, 'sha256');
    let failures = 0;
    const flaky: FileCopier = async (src, dest) => {
      if (src.endsWith('video.bin') && failures < 3) {
        failures++;
        throw errno('EBUSY', 'resource busy or locked');
      }
      await copyPreservingTimes(src, dest);
    };

    const result = await new DataTransfer({
      workers: 1,
      retry: fastRetry,
      copyFile: flaky,
    }).transfer(ledger);

    const job = result.jobs.find((j) => j.id === 'behavior/video.bin');
    expect(job).toMatchObject({
      state: TransferJobState.CONFIRMED,
      retryCount: 3,
      attempts: 4,
      lastError: null,
    });
  });

  it('fails a job immediately on a permanent error', async () => {
    const ledger = await buildLedger('s1', sourceDir, destination, 'sha256');
    const backend: TransferBackend = {
      name: 'test-backend',
      notify: vi.fn(async () => ({ receipt: 'r-1' })),
    };
    const denied: FileCopier = async (src, dest) => {
      if (src.endsWith('events.csv')) {
        throw errno('EACCES', 'permission denied');
      }
      await copyPreservingTimes(src, dest);
    };

    const result = await new DataTransfer({
      workers: 2,
      retry: fastRetry,
      copyFile: denied,
      backend,
    }).transfer(ledger);

    const job = result.jobs.find((j) => j.id === 'behavior/events.csv');
    expect(job).toMatchObject({
      state: TransferJobState.FAILED,
      permanent: true,
      attempts: 1,
      lastError: 'permission denied',
    });
    expect(backend.notify).not.toHaveBeenCalled();
    expect(result.notification).toMatchObject({
      state: 'FAILED',
      lastError: '1 file(s) not confirmed; test-backend was not notified.',
    });
    expect(isLedgerComplete(result)).toBe(false);
  });

  it('fails a job permanently after exhausting transient retries', async () => {
    const ledger = await buildLedger('s1', sourceDir, destination, 'sha256');
    const busy: FileCopier = async () => {
      throw errno('EBUSY');
    };
    const result = await new DataTransfer({
      workers: 1,
      retry: { ...fastRetry, maxAttempts: 2 },
      copyFile: busy,
    }).transfer(ledger);

    for (const job of result.jobs) {
      expect(job).toMatchObject({
        state: TransferJobState.FAILED,
        permanent: true,
        attempts: 2,
        retryCount: 1,
      });
    }
  });

  it('fails a job whose copy does not match the source', async () => {
    const ledger = await buildLedger('s1', sourceDir, destination, 'sha256');
    const corrupting: FileCopier = async (src, dest) => {
      await copyPreservingTimes(src, dest);
      if (src.endsWith('task.stdout.log')) {
        fs.writeFileSync(dest, 'truncated');
      }
    };
    const result = await new DataTransfer({
      workers: 1,
      retry: fastRetry,
      copyFile: corrupting,
    }).transfer(ledger);

    const job = result.jobs.find((j) => j.id === 'task.stdout.log');
    expect(job?.state).toBe(TransferJobState.FAILED);
    expect(job?.permanent).toBe(true);
    expect(job?.lastError).toMatch(/^Checksum mismatch for task\.stdout\.log/);
  });

  it('re-attempts only unconfirmed jobs when resuming', async () => {
    writeSource('extra/a.txt', 'a');
    writeSource('extra/b.txt', 'b');
    const store = LedgerStore.forSession(sourceDir);
    const ledger = await buildLedger('s1', sourceDir, destination, 'sha256');
    expect(ledger.jobs).toHaveLength(5);

    for (const job of ledger.jobs.slice(0, 2)) {
      await copyPreservingTimes(job.sourcePath, job.destinationPath);
      job.state = TransferJobState.CONFIRMED;
      job.attempts = 1;
    }
    await store.save(ledger);

    const loaded = await store.load();
    expect(loaded).not.toBeNull();
    if (!loaded) return;
    const { requeued } = await reconcileLedger(loaded);
    expect(requeued).toEqual([]);

    const copied: string[] = [];
    const counting: FileCopier = async (src, dest) => {
      copied.push(path.relative(sourceDir, src));
      await copyPreservingTimes(src, dest);
    };
    const result = await new DataTransfer({
      workers: 3,
      retry: fastRetry,
      store,
      copyFile: counting,
    }).transfer(loaded);

    expect(copied.sort()).toEqual(
      [
        path.join('extra', 'a.txt'),
        path.join('extra', 'b.txt'),
        'task.stdout.log',
      ].sort(),
    );
    expect(result.jobs.every((job) => job.state === TransferJobState.CONFIRMED)).toBe(true);
    for (const job of result.jobs) {
      const copy = await computeFingerprint(job.destinationPath, 'sha256');
      const source = await computeFingerprint(job.sourcePath, 'sha256');
      expect(copy).toEqual(source);
    }
  });

  it('re-queues a confirmed job whose source changed', async () => {
    const ledger = await buildLedger('s1', sourceDir, destination, 'sha256');
    await new DataTransfer({ workers: 2, retry: fastRetry }).transfer(ledger);

    writeSource('task.stdout.log', 'ok\nmore output\n');
    const { changed, requeued } = await reconcileLedger(ledger);

    expect(changed).toEqual(['task.stdout.log']);
    expect(requeued).toEqual(['task.stdout.log']);
    expect(ledger.jobs.find((j) => j.id === 'task.stdout.log')?.state).toBe(
      TransferJobState.PENDING,
    );
  });

  it('retries permanently failed jobs only when asked to', async () => {
    const ledger = await buildLedger('s1', sourceDir, destination, 'sha256');
    const [first] = ledger.jobs;
    if (!first) throw new Error('expected a job');
    first.state = TransferJobState.FAILED;
    first.permanent = true;

    expect((await reconcileLedger(ledger)).requeued).toEqual([]);
    expect((await reconcileLedger(ledger, { retryFailed: true })).requeued).toEqual([
      first.id,
    ]);
    expect(first.state).toBe(TransferJobState.PENDING);
  });

  it('leaves every job pending when aborted before copying', async () => {
    const ledger = await buildLedger('s1', sourceDir, destination, 'sha256');
    const controller = new AbortController();
    controller.abort();
    const backend: TransferBackend = {
      name: 'test-backend',
      notify: vi.fn(async () => ({ receipt: 'r-1' })),
    };
    const result = await new DataTransfer({
      workers: 2,
      retry: fastRetry,
      backend,
      signal: controller.signal,
    }).transfer(ledger);

    expect(result.jobs.every((job) => job.state === TransferJobState.PENDING)).toBe(true);
    expect(backend.notify).not.toHaveBeenCalled();
  });

  it('retries a transient notification failure without touching copies', async () => {
    const ledger = await buildLedger('s1', sourceDir, destination, 'sha256');
    const notify = vi
      .fn<TransferBackend['notify']>()
      .mockRejectedValueOnce(new TransferError('service unavailable', true))
      .mockResolvedValueOnce({ receipt: 'r-42' });
    const credentialProvider = {
      getCredentials: vi.fn(async () => ({ principal: 'svc-rig', secret: 'test-secret' })),
    };

    const result = await new DataTransfer({
      workers: 2,
      retry: fastRetry,
      backend: { name: 'test-backend', notify },
      credentialProvider,
    }).transfer(ledger);

    expect(notify).toHaveBeenCalledTimes(2);
    expect(notify.mock.calls[0]?.[1]).toEqual({
      principal: 'svc-rig',
      secret: 'test-secret',
    });
    expect(result.notification).toMatchObject({
      state: 'SENT',
      attempts: 2,
      receipt: 'r-42',
      lastError: null,
    });
  });

  it('records a failed notification and keeps copies confirmed', async () => {
    const ledger = await buildLedger('s1', sourceDir, destination, 'sha256');
    const notify = vi
      .fn<TransferBackend['notify']>()
      .mockRejectedValue(new TransferError('bad project', false));

    const result = await new DataTransfer({
      workers: 2,
      retry: fastRetry,
      backend: { name: 'test-backend', notify },
    }).transfer(ledger);

    expect(notify).toHaveBeenCalledTimes(1);
    expect(result.notification).toMatchObject({
      state: 'FAILED',
      lastError: 'bad project',
    });
    expect(result.jobs.every((job) => job.state === TransferJobState.CONFIRMED)).toBe(true);
  });

  it('never runs more copies at once than there are workers', async () => {
    writeSource('extra/a.txt', 'a');
    writeSource('extra/b.txt', 'b');
    const ledger = await buildLedger('s1', sourceDir, destination, 'sha256');
    expect(ledger.jobs).toHaveLength(5);

    let inFlight = 0;
    let peak = 0;
    const slow: FileCopier = async (src, dest) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 20));
      await copyPreservingTimes(src, dest);
      inFlight--;
    };

    const result = await new DataTransfer({
      workers: 2,
      retry: fastRetry,
      copyFile: slow,
    }).transfer(ledger);

    expect(peak).toBe(2);
    expect(summarizeLedger(result).confirmed).toBe(5);
  });

  it('stops taking jobs and rethrows once a ledger save fails', async () => {
    writeSource('extra/a.txt', 'a');
    const ledger = await buildLedger('s1', sourceDir, destination, 'sha256');
    expect(ledger.jobs).toHaveLength(4);

    // Saves one and two mark the first two jobs in flight; the third is
    // the first confirmation.
    class FailingStore extends LedgerStore {
      saves = 0;
      override save(current: Ledger): Promise<void> {
        this.saves++;
        if (this.saves === 3) {
          return Promise.reject(new Error('disk gone'));
        }
        return super.save(current);
      }
    }
    const store = new FailingStore(path.join(root, 'ledger.json'));
    let copies = 0;
    const counting: FileCopier = async (src, dest) => {
      copies++;
      await copyPreservingTimes(src, dest);
    };

    await expect(
      new DataTransfer({
        workers: 2,
        retry: fastRetry,
        store,
        copyFile: counting,
      }).transfer(ledger),
    ).rejects.toThrow('disk gone');
    expect(copies).toBe(2);
    expect(store.saves).toBe(4);
  });

  it('copies snapshots of the session records after the data', async () => {
    writeSource('launcher.log', '[launcher] Session started\n');
    writeSource('session.manifest.json', '{"status":"TRANSFER_DATA"}');
    const ledger = await buildLedger('s1', sourceDir, destination, 'sha256');
    expect(ledger.jobs.map((job) => job.id)).toEqual([
      'behavior/events.csv',
      'behavior/video.bin',
      'task.stdout.log',
    ]);
    const notify = vi.fn<TransferBackend['notify']>(async () => ({ receipt: 'r-7' }));

    const result = await new DataTransfer({
      workers: 2,
      retry: fastRetry,
      backend: { name: 'test-backend', notify },
      records: [
        path.join(sourceDir, 'launcher.log'),
        path.join(sourceDir, 'session.manifest.json'),
        path.join(sourceDir, 'missing.log'),
      ],
    }).transfer(ledger);

    expect(result.records.map((record) => [record.name, record.state, record.bytes])).toEqual([
      ['launcher.log', 'COPIED', 27],
      ['session.manifest.json', 'COPIED', 26],
    ]);
    expect(fs.readFileSync(path.join(destination, 'launcher.log'), 'utf-8')).toBe(
      '[launcher] Session started\n',
    );
    expect(
      fs.readFileSync(path.join(destination, 'session.manifest.json'), 'utf-8'),
    ).toBe('{"status":"TRANSFER_DATA"}');
    expect(notify).toHaveBeenCalledTimes(1);
    expect(isLedgerComplete(result)).toBe(true);
  });

  it('rejects a relative destination as permanent', async () => {
    const ledger = await buildLedger('s1', sourceDir, destination, 'sha256');
    const error = await new DataTransfer({ workers: 1, retry: fastRetry })
      .transfer(ledger, 'relative/path')
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransferError);
    expect(error).toMatchObject({ transient: false });
  });
});
