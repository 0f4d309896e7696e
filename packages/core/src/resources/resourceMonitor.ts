/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { EventEmitter } from 'node:events';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { debugLogger } from '../utils/debugLogger.js';
import { getErrorMessage, isNodeError } from '../utils/errors.js';
import type {
  ResourceMetric,
  ResourceMetrics,
  ResourceProbe,
  ResourceSnapshot,
  ResourceTargets,
  ResourceThresholds,
} from './types.js';

/** Walks up from `target` until an existing path is found. */
async function nearestExistingPath(target: string): Promise<string> {
  let current = path.resolve(target);
  for (;;) {
    try {
      await fs.stat(current);
      return current;
    } catch (error) {
      if (!isNodeError(error) || error.code !== 'ENOENT') {
        throw error;
      }
      const parent = path.dirname(current);
      if (parent === current) {
        return current;
      }
      current = parent;
    }
  }
}

export const defaultResourceProbe: ResourceProbe = {
  async freeDiskBytes(target: string): Promise<number> {
    const stats = await fs.statfs(await nearestExistingPath(target));
    return stats.bavail * stats.bsize;
  },
  freeMemoryBytes: () => os.freemem(),
  loadAverage: () => os.loadavg()[0] ?? 0,
};

type ThresholdRule = {
  metric: ResourceMetric;
  fails: (metrics: ResourceMetrics, thresholds: ResourceThresholds) => boolean;
};

const THRESHOLD_RULES: readonly ThresholdRule[] = [
  {
    metric: 'freeDiskBytes',
    fails: (m, t) =>
      t.minFreeDiskBytes !== undefined && m.freeDiskBytes < t.minFreeDiskBytes,
  },
  {
    metric: 'freeDestinationDiskBytes',
    fails: (m, t) =>
      t.minFreeDestinationDiskBytes !== undefined &&
      m.freeDestinationDiskBytes !== null &&
      m.freeDestinationDiskBytes < t.minFreeDestinationDiskBytes,
  },
  {
    metric: 'freeMemoryBytes',
    fails: (m, t) =>
      t.minFreeMemoryBytes !== undefined &&
      m.freeMemoryBytes < t.minFreeMemoryBytes,
  },
  {
    metric: 'loadAverage',
    fails: (m, t) =>
      t.maxLoadAverage !== undefined && m.loadAverage > t.maxLoadAverage,
  },
];

export function evaluateThresholds(
  metrics: ResourceMetrics,
  thresholds: ResourceThresholds,
): ResourceMetric[] {
  return THRESHOLD_RULES.filter((rule) => rule.fails(metrics, thresholds)).map(
    (rule) => rule.metric,
  );
}

export function describeFailingMetrics(snapshot: ResourceSnapshot): string[] {
  return snapshot.failing.map((metric) => {
    const value = snapshot.metrics[metric];
    return `${metric} is ${value ?? 'unknown'}`;
  });
}

export class ResourceWatch {
  private readonly emitter = new EventEmitter();
  private readonly collected: ResourceSnapshot[] = [];
  private timer: NodeJS.Timeout | undefined;
  private sampling = false;

  constructor(
    private readonly sample: () => Promise<ResourceSnapshot>,
    intervalMs: number,
  ) {
    this.timer = setInterval(() => {
      void this.tick();
    }, intervalMs);
    this.timer.unref();
  }

  get snapshots(): readonly ResourceSnapshot[] {
    return this.collected;
  }

  on(event: 'snapshot', listener: (snapshot: ResourceSnapshot) => void): this;
  on(event: 'breach', listener: (snapshot: ResourceSnapshot) => void): this;
  on(event: string, listener: (snapshot: ResourceSnapshot) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.emitter.removeAllListeners();
  }

  private async tick(): Promise<void> {
    if (this.sampling || !this.timer) {
      return;
    }
    this.sampling = true;
    try {
      const snapshot = await this.sample();
      if (!this.timer) {
        return;
      }
      this.collected.push(snapshot);
      this.emitter.emit('snapshot', snapshot);
      if (!snapshot.passed) {
        this.emitter.emit('breach', snapshot);
      }
    } catch (error) {
      // A probe failure is not evidence of a breach.
      debugLogger.warn(
        `[resources] Skipping sample: ${getErrorMessage(error)}`,
      );
    } finally {
      this.sampling = false;
    }
  }
}

export class ResourceMonitor {
  constructor(
    private readonly targets: ResourceTargets,
    private readonly probe: ResourceProbe = defaultResourceProbe,
  ) {}

  async check(
    thresholds: ResourceThresholds,
    checkpoint = 'check',
  ): Promise<ResourceSnapshot> {
    const metrics = await this.measure();
    const failing = evaluateThresholds(metrics, thresholds);
    const snapshot: ResourceSnapshot = {
      timestamp: new Date().toISOString(),
      checkpoint,
      metrics,
      passed: failing.length === 0,
      failing,
    };
    debugLogger.debug(
      `[resources] ${checkpoint}: ${snapshot.passed ? 'pass' : `fail (${failing.join(', ')})`}`,
    );
    return snapshot;
  }

  /** Samples every `intervalMs` until `stop()` is called. */
  watch(thresholds: ResourceThresholds, intervalMs: number): ResourceWatch {
    return new ResourceWatch(() => this.check(thresholds, 'watch'), intervalMs);
  }

  private async measure(): Promise<ResourceMetrics> {
    const [freeDiskBytes, freeDestinationDiskBytes] = await Promise.all([
      this.probe.freeDiskBytes(this.targets.localPath),
      this.targets.destinationPath === undefined
        ? Promise.resolve(null)
        : this.probe.freeDiskBytes(this.targets.destinationPath),
    ]);
    return {
      freeDiskBytes,
      freeDestinationDiskBytes,
      freeMemoryBytes: this.probe.freeMemoryBytes(),
      loadAverage: this.probe.loadAverage(),
    };
  }
}
