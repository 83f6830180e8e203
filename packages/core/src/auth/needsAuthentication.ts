/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Words that show up when the agent reports it could not reach Confluence
 * for lack of credentials. English and Japanese.
 */
export const AUTH_KEYWORDS: readonly string[] = [
  'authentication',
  'authorize',
  'authorization',
  'auth',
  'sign in',
  'login',
  'access',
  'permission',
  'credential',
  '認証',
  'アクセス',
  '許可',
  '権限',
  'ログイン',
];

/**
 * Heuristic check over the agent's final text. It is a substring match, so
 * "access" in an unrelated sentence is a false positive and wording outside
 * the list is missed; both are accepted.
 */
export function needsAuthentication(
  responseText: string,
  keywords: readonly string[] = AUTH_KEYWORDS,
): boolean {
  const haystack = responseText.toLowerCase();
  return keywords.some((keyword) => haystack.includes(keyword.toLowerCase()));
}
