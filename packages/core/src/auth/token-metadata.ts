/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/index.js';
import { JwtClaimsSchema, type TokenMetadata } from './types.js';

const logger = new DebugLogger('pagewright:auth:token-metadata');

/**
 * Reads the claims of a JWT access token without verifying its signature.
 * Opaque or malformed tokens yield `{}`.
 */
export function decodeTokenMetadata(accessToken: string): TokenMetadata {
  const parts = accessToken.split('.');
  if (parts.length !== 3) {
    return {};
  }

  try {
    const decoded = Buffer.from(parts[1], 'base64url').toString('utf-8');
    const parsed: unknown = JSON.parse(decoded);
    const result = JwtClaimsSchema.safeParse(parsed);
    if (!result.success) {
      return {};
    }
    const claims = result.data;
    const metadata: TokenMetadata = {};
    if (claims.iss !== undefined) metadata.issuer = claims.iss;
    if (claims.sub !== undefined) metadata.subject = claims.sub;
    if (claims.aud !== undefined) metadata.audience = claims.aud;
    if (claims.iat !== undefined) metadata.issuedAt = claims.iat;
    if (claims.exp !== undefined) metadata.expiresAt = claims.exp;
    if (claims.scope !== undefined) metadata.scope = claims.scope;
    return metadata;
  } catch (error) {
    logger.debug(() => `Token payload is not JSON: ${String(error)}`);
    return {};
  }
}

/**
 * `YYYY-MM-DD HH:mm:ss` in UTC, or undefined when the token has no expiry.
 */
export function formatExpiry(metadata: TokenMetadata): string | undefined {
  if (metadata.expiresAt === undefined) {
    return undefined;
  }
  return new Date(metadata.expiresAt * 1000)
    .toISOString()
    .replace('T', ' ')
    .slice(0, 19);
}
