/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/index.js';
import { getErrorMessage } from '../utils/errors.js';
import type { AgentSession } from '../session/AgentSession.js';
import type { StreamingChannel } from '../streaming/StreamingChannel.js';
import { statusEvent } from '../streaming/types.js';
import { OAuthError } from './oauth-errors.js';
import { decodeTokenMetadata, formatExpiry } from './token-metadata.js';
import type { TenantResolver } from './tenant-resolver.js';
import type {
  AuthFlow,
  AuthorizationProvider,
  Credential,
} from './types.js';

export interface AuthenticationGateOptions {
  provider: AuthorizationProvider;
  resolveTenant: TenantResolver;
  scopes: string[];
  flow?: AuthFlow;
  forceAuthentication?: boolean;
}

const logger = new DebugLogger('pagewright:auth:gate');

const DEFAULT_TOOL_LABEL = 'Confluence';

/**
 * Obtains a fresh credential for one session and narrates the attempt on the
 * invocation's channel. Never throws: every failure is reported as an error
 * status and yields `false`.
 */
export class AuthenticationGate {
  constructor(
    private readonly options: AuthenticationGateOptions,
    private readonly session: AgentSession,
    private readonly channel: StreamingChannel,
  ) {}

  async handleAuthentication(): Promise<boolean> {
    const toolName = this.session.lastToolName ?? DEFAULT_TOOL_LABEL;
    this.channel.put(
      statusEvent(
        `Authentication required for ${toolName} access. Starting authorization flow...`,
      ),
    );

    const store = this.session.credentialStore;
    if (store.isAuthorizing(this.session.id)) {
      logger.debug(
        () => `Session ${this.session.id} already authorizing, waiting for it`,
      );
    }

    try {
      const credential = await store.authorize(
        this.session.id,
        (publishAuthUrl) => this.acquireCredential(publishAuthUrl),
        (url) => this.onAuthUrl(url),
      );

      if (!credential) {
        this.channel.put(
          statusEvent('Failed to obtain Atlassian Cloud ID', 'error'),
        );
        return false;
      }

      this.channel.put(
        statusEvent(
          `Authentication successful! Atlassian Cloud ID: ${credential.tenantId}`,
        ),
      );
      this.channel.put(statusEvent(`Retrying ${toolName}...`));
      return true;
    } catch (error) {
      logger.warn(() =>
        error instanceof OAuthError
          ? `Authentication failed: ${JSON.stringify(error.toLogEntry())}`
          : `Authentication failed: ${getErrorMessage(error)}`,
      );
      this.channel.put(
        statusEvent(`Authentication failed: ${getErrorMessage(error)}`, 'error'),
      );
      return false;
    }
  }

  private async acquireCredential(
    publishAuthUrl: (url: string) => void,
  ): Promise<Credential | null> {
    const accessToken = await this.options.provider.requestAccessToken({
      sessionId: this.session.id,
      scopes: this.options.scopes,
      flow: this.options.flow ?? 'USER_FEDERATION',
      forceAuthentication: this.options.forceAuthentication ?? false,
      onAuthUrl: publishAuthUrl,
    });

    const tenantId = await this.options.resolveTenant(accessToken);
    if (!tenantId) {
      return null;
    }

    const metadata = decodeTokenMetadata(accessToken);
    logger.debug(
      () =>
        `Credential obtained for session ${this.session.id}, expires ${formatExpiry(metadata) ?? 'unknown'}`,
    );
    return { accessToken, tenantId, metadata, obtainedAt: Date.now() };
  }

  /**
   * Publishes the consent URL and returns at once; the provider owns waiting
   * for the user. Gates that joined an in-flight authorization on the same
   * session receive the URL too.
   */
  private onAuthUrl(url: string): void {
    logger.log(() => 'Authorization required, consent URL published');
    this.channel.put({ type: 'auth_url', url });
  }
}
