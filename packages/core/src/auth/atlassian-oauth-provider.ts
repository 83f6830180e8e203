/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { randomBytes } from 'node:crypto';
import { DebugLogger } from '../debug/index.js';
import { fetchWithTimeout } from '../utils/fetch.js';
import { toError } from '../utils/errors.js';
import { OAuthErrorFactory } from './oauth-errors.js';
import type { PendingAuthorizations } from './PendingAuthorizations.js';
import {
  TokenResponseSchema,
  type AccessTokenRequest,
  type AuthorizationProvider,
} from './types.js';

const logger = new DebugLogger('pagewright:auth:atlassian');

const ATLASSIAN_OAUTH = {
  authorizationEndpoint: 'https://auth.atlassian.com/authorize',
  tokenEndpoint: 'https://auth.atlassian.com/oauth/token',
  audience: 'api.atlassian.com',
} as const;

/** Cached tokens are not handed out within this many seconds of expiry. */
const EXPIRY_SKEW_SECONDS = 30;

export interface AtlassianOAuthConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  consentTimeoutMs: number;
  pending: PendingAuthorizations;
}

interface CachedToken {
  accessToken: string;
  /** Unix seconds */
  expiry: number;
}

/**
 * Atlassian OAuth 2.0 (3LO) authorization-code flow. Tokens are cached per
 * session and scope set, so one session never receives another's token.
 *
 * The consent URL goes to the caller through `onAuthUrl`; the code comes back
 * through the `/oauth/callback` route, which completes the matching
 * {@link PendingAuthorizations} entry.
 */
export class AtlassianOAuthProvider implements AuthorizationProvider {
  readonly name = 'atlassian';
  private readonly cache: Map<string, CachedToken> = new Map();

  constructor(private readonly config: AtlassianOAuthConfig) {}

  async requestAccessToken(request: AccessTokenRequest): Promise<string> {
    if (request.flow !== 'USER_FEDERATION') {
      throw OAuthErrorFactory.unsupportedFlow(this.name, request.flow);
    }

    const scopeKey = [...request.scopes].sort().join(' ');
    const cacheKey = `${request.sessionId}\n${scopeKey}`;
    const cached = this.cache.get(cacheKey);
    const now = Math.floor(Date.now() / 1000);
    if (
      !request.forceAuthentication &&
      cached &&
      cached.expiry - EXPIRY_SKEW_SECONDS > now
    ) {
      logger.debug(
        () => `Reusing cached Atlassian token for session ${request.sessionId}`,
      );
      return cached.accessToken;
    }

    const state = randomBytes(16).toString('base64url');
    const callback = this.config.pending.waitFor(
      state,
      this.config.consentTimeoutMs,
      () =>
        OAuthErrorFactory.consentTimedOut(
          this.name,
          this.config.consentTimeoutMs,
        ),
    );

    try {
      await request.onAuthUrl(
        this.buildAuthorizationUrl(request.scopes, state),
      );
    } catch (error) {
      this.config.pending.fail(state, toError(error));
    }

    const { code } = await callback;
    try {
      const token = await this.exchangeCodeForToken(code);
      this.cache.set(cacheKey, token);
      return token.accessToken;
    } catch (error) {
      throw OAuthErrorFactory.fromUnknown(this.name, error);
    }
  }

  buildAuthorizationUrl(scopes: string[], state: string): string {
    const params = new URLSearchParams({
      audience: ATLASSIAN_OAUTH.audience,
      client_id: this.config.clientId,
      scope: scopes.join(' '),
      redirect_uri: this.config.redirectUri,
      state,
      response_type: 'code',
      prompt: 'consent',
    });
    return `${ATLASSIAN_OAUTH.authorizationEndpoint}?${params.toString()}`;
  }

  private async exchangeCodeForToken(code: string): Promise<CachedToken> {
    logger.debug(() => 'Exchanging authorization code for tokens');

    const response = await fetchWithTimeout(ATLASSIAN_OAUTH.tokenEndpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: JSON.stringify({
        grant_type: 'authorization_code',
        client_id: this.config.clientId,
        client_secret: this.config.clientSecret,
        code,
        redirect_uri: this.config.redirectUri,
      }),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw OAuthErrorFactory.tokenExchangeFailed(
        this.name,
        response.status,
        errorText,
      );
    }

    const data: unknown = await response.json();
    const tokenResponse = TokenResponseSchema.parse(data);
    const expiresIn = tokenResponse.expires_in ?? 3600;

    return {
      accessToken: tokenResponse.access_token,
      expiry: Math.floor(Date.now() / 1000) + expiresIn,
    };
  }
}
