/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  OAuthError,
  OAuthErrorCategory,
  OAuthErrorFactory,
  OAuthErrorType,
} from './oauth-errors.js';
import { FetchError } from '../utils/fetch.js';

describe('OAuthErrorFactory.fromUnknown', () => {
  it('returns OAuth errors unchanged', () => {
    const error = OAuthErrorFactory.accessDenied('atlassian', 'no');
    expect(OAuthErrorFactory.fromUnknown('atlassian', error)).toBe(error);
  });

  it('classifies fetch timeouts and network failures as transient', () => {
    const timeout = OAuthErrorFactory.fromUnknown(
      'atlassian',
      new FetchError('Request timed out after 10ms', 'ETIMEDOUT'),
    );
    const network = OAuthErrorFactory.fromUnknown(
      'atlassian',
      new FetchError('fetch failed'),
    );

    expect(timeout.type).toBe(OAuthErrorType.TIMEOUT);
    expect(network.type).toBe(OAuthErrorType.NETWORK_ERROR);
    expect(network.isRetryable).toBe(true);
    expect(network.message).toBe('fetch failed');
  });

  it('treats schema failures as a malformed token response', () => {
    const parsed = z.object({ access_token: z.string() }).safeParse({});
    const error = OAuthErrorFactory.fromUnknown(
      'atlassian',
      parsed.success ? undefined : parsed.error,
    );

    expect(error.type).toBe(OAuthErrorType.MALFORMED_TOKEN);
    expect(error.category).toBe(OAuthErrorCategory.CRITICAL);
    expect(error.message).toBe('Token response was malformed');
  });

  it('wraps anything else as unknown', () => {
    const error = OAuthErrorFactory.fromUnknown('atlassian', 'boom');
    expect(error).toBeInstanceOf(OAuthError);
    expect(error.type).toBe(OAuthErrorType.UNKNOWN);
    expect(error.message).toBe('boom');
  });
});

describe('OAuthError.toLogEntry', () => {
  it('summarises the error without the original stack', () => {
    const error = new OAuthError(
      OAuthErrorType.SERVICE_UNAVAILABLE,
      'atlassian',
      'Token exchange failed: 503 down',
      { technicalDetails: { status: 503 }, originalError: new Error('down') },
    );

    expect(error.toLogEntry()).toEqual({
      type: 'service_unavailable',
      category: 'transient',
      provider: 'atlassian',
      isRetryable: true,
      message: 'Token exchange failed: 503 down',
      technicalDetails: { status: 503 },
      originalError: { name: 'Error', message: 'down' },
    });
  });
});
