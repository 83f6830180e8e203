/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ProxyAgent, setGlobalDispatcher } from 'undici';
import { getErrorMessage, isNodeError } from './errors.js';

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

export class FetchError extends Error {
  constructor(
    message: string,
    public code?: string,
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

/**
 * `fetch` with a deadline. Network and timeout failures surface as
 * {@link FetchError}; HTTP error statuses are returned to the caller as-is.
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit = {},
  timeout: number = DEFAULT_FETCH_TIMEOUT_MS,
): Promise<Response> {
  try {
    return await fetch(url, { ...init, signal: AbortSignal.timeout(timeout) });
  } catch (error: unknown) {
    if (
      (isNodeError(error) && error.code === 'ABORT_ERR') ||
      (error instanceof Error &&
        (error.name === 'AbortError' || error.name === 'TimeoutError'))
    ) {
      throw new FetchError(`Request timed out after ${timeout}ms`, 'ETIMEDOUT');
    }
    throw new FetchError(getErrorMessage(error));
  }
}

export function setGlobalProxy(proxy: string): void {
  setGlobalDispatcher(new ProxyAgent(proxy));
}
