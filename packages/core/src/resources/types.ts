/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type ResourceMetric =
  | 'freeDiskBytes'
  | 'freeDestinationDiskBytes'
  | 'freeMemoryBytes'
  | 'loadAverage';

export interface ResourceThresholds {
  minFreeDiskBytes?: number;
  minFreeDestinationDiskBytes?: number;
  minFreeMemoryBytes?: number;
  /** One-minute load average. */
  maxLoadAverage?: number;
}

export interface ResourceMetrics {
  freeDiskBytes: number;
  /** `null` when no destination is configured for this check. */
  freeDestinationDiskBytes: number | null;
  freeMemoryBytes: number;
  loadAverage: number;
}

export interface ResourceSnapshot {
  timestamp: string;
  checkpoint: string;
  metrics: ResourceMetrics;
  passed: boolean;
  failing: ResourceMetric[];
}

export interface ResourceProbe {
  freeDiskBytes(path: string): Promise<number>;
  freeMemoryBytes(): number;
  loadAverage(): number;
}

export interface ResourceTargets {
  /** Local working volume, usually the session data directory. */
  localPath: string;
  destinationPath?: string;
}
