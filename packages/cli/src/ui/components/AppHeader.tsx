/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Banner } from './Banner.js';

interface AppHeaderProps {
  version: string;
  rigId: string;
  dataDir: string;
}

export const AppHeader = ({ version, rigId, dataDir }: AppHeaderProps) => (
  <Banner
    title="experiment launcher"
    details={[`v${version}`, `rig ${rigId}`, `data ${dataDir}`]}
  />
);
