/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/index.js';
import type { Credential } from './types.js';

const logger = new DebugLogger('pagewright:auth:store');

export const DEFAULT_SESSION_ID = 'default';

export type AuthUrlListener = (url: string) => void;

interface InflightAuthorization {
  promise: Promise<Credential | null>;
  /** Consent URLs published so far, replayed to late joiners */
  urls: string[];
  listeners: Set<AuthUrlListener>;
}

/**
 * In-memory credentials keyed by session id. Nothing is persisted.
 *
 * Writes go through {@link CredentialStore.authorize}, which runs at most one
 * authorization per session at a time: callers arriving while one is in
 * flight receive that same outcome instead of starting a second consent, and
 * every caller is told about the consent URL.
 */
export class CredentialStore {
  private readonly credentials: Map<string, Credential> = new Map();
  private readonly inflight: Map<string, InflightAuthorization> = new Map();

  get(sessionId: string): Credential | undefined {
    return this.credentials.get(sessionId);
  }

  isAuthorizing(sessionId: string): boolean {
    return this.inflight.has(sessionId);
  }

  /**
   * Runs `acquire` for `sessionId`, or joins the run already in flight.
   * URLs passed to the `publishAuthUrl` argument of `acquire` reach the
   * `onAuthUrl` of every caller sharing the run.
   */
  async authorize(
    sessionId: string,
    acquire: (publishAuthUrl: AuthUrlListener) => Promise<Credential | null>,
    onAuthUrl?: AuthUrlListener,
  ): Promise<Credential | null> {
    const running = this.inflight.get(sessionId);
    if (running) {
      logger.debug(
        () => `Joining in-flight authorization for session ${sessionId}`,
      );
      if (onAuthUrl) {
        running.urls.forEach((url) => onAuthUrl(url));
        running.listeners.add(onAuthUrl);
      }
      return running.promise;
    }

    const urls: string[] = [];
    const listeners = new Set<AuthUrlListener>();
    if (onAuthUrl) {
      listeners.add(onAuthUrl);
    }
    const publishAuthUrl = (url: string) => {
      urls.push(url);
      listeners.forEach((listener) => listener(url));
    };

    const promise = acquire(publishAuthUrl).then((credential) => {
      if (credential) {
        this.credentials.set(sessionId, credential);
      }
      return credential;
    });
    this.inflight.set(sessionId, { promise, urls, listeners });

    try {
      return await promise;
    } finally {
      this.inflight.delete(sessionId);
    }
  }
}
