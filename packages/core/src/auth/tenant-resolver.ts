/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/index.js';
import { fetchWithTimeout } from '../utils/fetch.js';
import { AccessibleResourcesSchema } from './types.js';

const logger = new DebugLogger('pagewright:auth:tenant');

export const ATLASSIAN_ACCESSIBLE_RESOURCES_URL =
  'https://api.atlassian.com/oauth/token/accessible-resources';

export type TenantResolver = (accessToken: string) => Promise<string | null>;

export function createAuthHeaders(accessToken: string): Record<string, string> {
  return {
    Authorization: `Bearer ${accessToken}`,
    Accept: 'application/json',
  };
}

/**
 * Looks up the cloud id of the first site the token can reach.
 *
 * A non-200 status, a body that is not a list of resources, or an empty
 * list all yield null. Network failures reject.
 */
export async function resolveAtlassianCloudId(
  accessToken: string,
): Promise<string | null> {
  const response = await fetchWithTimeout(ATLASSIAN_ACCESSIBLE_RESOURCES_URL, {
    method: 'GET',
    headers: createAuthHeaders(accessToken),
  });

  if (response.status !== 200) {
    logger.warn(() => `Accessible resources lookup returned ${response.status}`);
    return null;
  }

  const data: unknown = await response.json();
  const parsed = AccessibleResourcesSchema.safeParse(data);
  if (!parsed.success) {
    logger.warn(() => 'Accessible resources response has an unexpected shape');
    return null;
  }

  const [first] = parsed.data;
  return first ? first.id : null;
}
