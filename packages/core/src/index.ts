/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Config
export * from './config/config.js';

// Launcher
export * from './launcher/launcher.js';
export * from './launcher/types.js';

// Session
export * from './session/types.js';
export * from './session/stageMachine.js';
export * from './session/manifest.js';

// Components
export * from './git/types.js';
export * from './git/gitManager.js';
export * from './git/versionPolicy.js';
export * from './resources/types.js';
export * from './resources/resourceMonitor.js';
export * from './picker/types.js';
export * from './picker/headlessPicker.js';
export * from './mapper/types.js';
export * from './mapper/dataMapper.js';
export * from './mapper/jsonSessionSchemaMapper.js';
export * from './task/processSupervisor.js';
export * from './environment/snapshot.js';

// Transfer
export * from './transfer/types.js';
export * from './transfer/classify.js';
export * from './transfer/ledger.js';
export * from './transfer/dataTransfer.js';
export * from './transfer/flagDirectoryBackend.js';

// Utilities
export * from './utils/errors.js';
export * from './utils/debugLogger.js';
export * from './utils/retry.js';
export * from './utils/atomicFile.js';
export * from './utils/fingerprint.js';
