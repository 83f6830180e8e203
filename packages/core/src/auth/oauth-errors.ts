/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ZodError } from 'zod';
import { FetchError } from '../utils/fetch.js';

/**
 * OAuth error categories used to decide how a failure is reported
 */
export enum OAuthErrorCategory {
  /** The user has to act (grant consent, retry sign-in) */
  USER_ACTION_REQUIRED = 'user_action_required',
  /** Network or temporary provider issues */
  TRANSIENT = 'transient',
  /** The provider returned something unusable */
  CRITICAL = 'critical',
  /** The server is not set up for the requested flow */
  CONFIGURATION = 'configuration',
}

export enum OAuthErrorType {
  AUTHENTICATION_REQUIRED = 'authentication_required',
  ACCESS_DENIED = 'access_denied',
  TIMEOUT = 'timeout',
  NETWORK_ERROR = 'network_error',
  SERVICE_UNAVAILABLE = 'service_unavailable',
  MALFORMED_TOKEN = 'malformed_token',
  UNSUPPORTED_FLOW = 'unsupported_flow',
  UNKNOWN = 'unknown',
}

export class OAuthError extends Error {
  readonly category: OAuthErrorCategory;
  readonly type: OAuthErrorType;
  readonly provider: string;
  readonly isRetryable: boolean;
  readonly technicalDetails: Record<string, unknown>;
  readonly originalError: Error | null;

  constructor(
    type: OAuthErrorType,
    provider: string,
    message: string,
    options: {
      technicalDetails?: Record<string, unknown>;
      originalError?: Error;
    } = {},
  ) {
    super(message);
    this.name = 'OAuthError';
    this.type = type;
    this.provider = provider;
    this.category = categorize(type);
    this.isRetryable = this.category === OAuthErrorCategory.TRANSIENT;
    this.technicalDetails = options.technicalDetails ?? {};
    this.originalError = options.originalError ?? null;
  }

  /**
   * Sanitized shape for logging; never includes tokens or codes.
   */
  toLogEntry(): Record<string, unknown> {
    return {
      type: this.type,
      category: this.category,
      provider: this.provider,
      isRetryable: this.isRetryable,
      message: this.message,
      technicalDetails: this.technicalDetails,
      originalError: this.originalError
        ? { name: this.originalError.name, message: this.originalError.message }
        : null,
    };
  }
}

function categorize(type: OAuthErrorType): OAuthErrorCategory {
  switch (type) {
    case OAuthErrorType.AUTHENTICATION_REQUIRED:
    case OAuthErrorType.ACCESS_DENIED:
      return OAuthErrorCategory.USER_ACTION_REQUIRED;

    case OAuthErrorType.TIMEOUT:
    case OAuthErrorType.NETWORK_ERROR:
    case OAuthErrorType.SERVICE_UNAVAILABLE:
      return OAuthErrorCategory.TRANSIENT;

    case OAuthErrorType.MALFORMED_TOKEN:
      return OAuthErrorCategory.CRITICAL;

    case OAuthErrorType.UNSUPPORTED_FLOW:
      return OAuthErrorCategory.CONFIGURATION;

    default:
      return OAuthErrorCategory.TRANSIENT;
  }
}

/**
 * Factories for the failures the authorization-code flow produces
 */
export class OAuthErrorFactory {
  static consentTimedOut(provider: string, timeoutMs: number): OAuthError {
    return new OAuthError(
      OAuthErrorType.TIMEOUT,
      provider,
      `Authorization was not completed within ${timeoutMs}ms`,
      { technicalDetails: { timeoutMs } },
    );
  }

  static accessDenied(provider: string, reason: string): OAuthError {
    return new OAuthError(
      OAuthErrorType.ACCESS_DENIED,
      provider,
      `Authorization was denied: ${reason}`,
    );
  }

  static unsupportedFlow(provider: string, flow: string): OAuthError {
    return new OAuthError(
      OAuthErrorType.UNSUPPORTED_FLOW,
      provider,
      `Auth flow ${flow} is not supported by ${provider}`,
      { technicalDetails: { flow } },
    );
  }

  static tokenExchangeFailed(
    provider: string,
    status: number,
    body: string,
  ): OAuthError {
    return new OAuthError(
      status >= 500
        ? OAuthErrorType.SERVICE_UNAVAILABLE
        : OAuthErrorType.AUTHENTICATION_REQUIRED,
      provider,
      `Token exchange failed: ${status} ${body}`,
      { technicalDetails: { status } },
    );
  }

  static fromUnknown(provider: string, error: unknown): OAuthError {
    if (error instanceof OAuthError) {
      return error;
    }
    if (error instanceof FetchError) {
      return new OAuthError(
        error.code === 'ETIMEDOUT'
          ? OAuthErrorType.TIMEOUT
          : OAuthErrorType.NETWORK_ERROR,
        provider,
        error.message,
        { originalError: error },
      );
    }
    if (error instanceof ZodError) {
      return new OAuthError(
        OAuthErrorType.MALFORMED_TOKEN,
        provider,
        'Token response was malformed',
        {
          technicalDetails: { issues: error.issues.length },
          originalError: error,
        },
      );
    }
    const originalError = error instanceof Error ? error : undefined;
    return new OAuthError(
      OAuthErrorType.UNKNOWN,
      provider,
      originalError ? originalError.message : String(error),
      { originalError },
    );
  }
}
