/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

/**
 * One entry of the Atlassian accessible-resources response
 */
export const AccessibleResourceSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    url: z.string().optional(),
    scopes: z.array(z.string()).optional(),
  })
  .passthrough();

export const AccessibleResourcesSchema = z.array(AccessibleResourceSchema);

/**
 * Token endpoint response for the authorization-code grant
 */
export const TokenResponseSchema = z.object({
  access_token: z.string(),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
  refresh_token: z.string().optional(),
  scope: z.string().nullable().optional(),
});

/**
 * Claims read from the access token without verifying it
 */
export const JwtClaimsSchema = z
  .object({
    iss: z.string().optional(),
    sub: z.string().optional(),
    aud: z.union([z.string(), z.array(z.string())]).optional(),
    iat: z.number().optional(),
    exp: z.number().optional(),
    scope: z.string().optional(),
  })
  .passthrough();

export type AccessibleResource = z.infer<typeof AccessibleResourceSchema>;
export type TokenResponse = z.infer<typeof TokenResponseSchema>;
export type JwtClaims = z.infer<typeof JwtClaimsSchema>;

export interface TokenMetadata {
  issuer?: string;
  subject?: string;
  audience?: string | string[];
  /** Unix seconds */
  issuedAt?: number;
  /** Unix seconds */
  expiresAt?: number;
  scope?: string;
}

export interface Credential {
  accessToken: string;
  /** Atlassian cloud id the token was resolved against */
  tenantId: string;
  metadata: TokenMetadata;
  obtainedAt: number;
}

export type AuthFlow = 'USER_FEDERATION' | 'M2M';

export type AuthUrlCallback = (url: string) => void | Promise<void>;

export interface AccessTokenRequest {
  /** Session the token is for; tokens are never shared across sessions */
  sessionId: string;
  scopes: string[];
  flow: AuthFlow;
  forceAuthentication: boolean;
  onAuthUrl: AuthUrlCallback;
}

/**
 * Source of bearer tokens. Implementations call `onAuthUrl` when the user
 * has to grant consent and resolve once a token is available.
 */
export interface AuthorizationProvider {
  readonly name: string;
  requestAccessToken(request: AccessTokenRequest): Promise<string>;
}
