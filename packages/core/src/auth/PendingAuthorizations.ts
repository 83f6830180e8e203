/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/index.js';

const logger = new DebugLogger('pagewright:auth:pending');

export interface AuthorizationCallback {
  code: string;
  state: string;
}

interface PendingEntry {
  resolve: (callback: AuthorizationCallback) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout;
}

/**
 * Connects an authorization request waiting for consent with the HTTP
 * callback that later delivers its code. Entries are keyed by the OAuth
 * `state` value and settle exactly once.
 */
export class PendingAuthorizations {
  private readonly entries: Map<string, PendingEntry> = new Map();

  /**
   * Registers `state` and resolves with the callback for it, or rejects with
   * `onTimeout()` after `timeoutMs`.
   */
  waitFor(
    state: string,
    timeoutMs: number,
    onTimeout: () => Error,
  ): Promise<AuthorizationCallback> {
    if (this.entries.has(state)) {
      return Promise.reject(
        new Error('Authorization state is already pending'),
      );
    }

    return new Promise<AuthorizationCallback>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.entries.delete(state);
        logger.warn(() => 'Authorization callback timed out');
        reject(onTimeout());
      }, timeoutMs);
      this.entries.set(state, { resolve, reject, timeout });
    });
  }

  /**
   * Delivers an authorization code. Returns false when nothing is waiting on
   * `state` (unknown, already settled, or timed out).
   */
  complete(state: string, code: string): boolean {
    const entry = this.take(state);
    if (!entry) {
      return false;
    }
    entry.resolve({ code, state });
    return true;
  }

  fail(state: string, error: Error): boolean {
    const entry = this.take(state);
    if (!entry) {
      return false;
    }
    entry.reject(error);
    return true;
  }

  has(state: string): boolean {
    return this.entries.has(state);
  }

  get size(): number {
    return this.entries.size;
  }

  private take(state: string): PendingEntry | undefined {
    const entry = this.entries.get(state);
    if (entry) {
      clearTimeout(entry.timeout);
      this.entries.delete(state);
    }
    return entry;
  }
}
