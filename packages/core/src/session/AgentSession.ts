/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CredentialStore } from '../auth/CredentialStore.js';
import type { Credential } from '../auth/types.js';

/**
 * Per-session view over shared credential state, handed to the agent, its
 * tools, and the authentication gate instead of module-level globals.
 */
export class AgentSession {
  /** Name of the last tool the agent invoked in this session. */
  lastToolName: string | undefined;

  constructor(
    readonly id: string,
    private readonly store: CredentialStore,
  ) {}

  get credential(): Credential | undefined {
    return this.store.get(this.id);
  }

  get credentialStore(): CredentialStore {
    return this.store;
  }
}
