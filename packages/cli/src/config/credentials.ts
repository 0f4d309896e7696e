/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as os from 'node:os';
import type { CredentialProvider, Credentials } from '@experiment-launcher/core';

export const TRANSFER_PRINCIPAL_ENV = 'EXPERIMENT_LAUNCHER_TRANSFER_PRINCIPAL';
export const TRANSFER_SECRET_ENV = 'EXPERIMENT_LAUNCHER_TRANSFER_SECRET';

/**
 * Credentials for the transfer notification come from the environment,
 * falling back to the local account name as principal.
 */
export class EnvironmentCredentialProvider implements CredentialProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async getCredentials(): Promise<Credentials> {
    const principal = this.env[TRANSFER_PRINCIPAL_ENV] || os.userInfo().username;
    const secret = this.env[TRANSFER_SECRET_ENV];
    return secret ? { principal, secret } : { principal };
  }
}
