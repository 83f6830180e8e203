/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { AUTH_KEYWORDS, needsAuthentication } from './needsAuthentication.js';

describe('needsAuthentication', () => {
  it.each([
    ['Please sign in first', true],
    ['Atlassian authentication is required for get_confluence_page.', true],
    ['I do not have PERMISSION to view that space', true],
    ['Confluenceへのアクセスには認証が必要です', true],
    ['Page created successfully', false],
    ['Found 3 pages matching "roadmap"', false],
    ['', false],
  ])('classifies %j as %s', (text, expected) => {
    expect(needsAuthentication(text)).toBe(expected);
  });

  it('accepts the known false positive on unrelated "access"', () => {
    expect(needsAuthentication('The page lists access patterns for S3')).toBe(
      true,
    );
  });

  it('matches any text that embeds a keyword regardless of case', () => {
    fc.assert(
      fc.property(
        fc.constantFrom(...AUTH_KEYWORDS),
        fc.string(),
        fc.string(),
        (keyword, prefix, suffix) =>
          needsAuthentication(`${prefix}${keyword.toUpperCase()}${suffix}`),
      ),
    );
  });

  it('supports a custom keyword set', () => {
    expect(needsAuthentication('token expired', ['expired'])).toBe(true);
    expect(needsAuthentication('login required', ['expired'])).toBe(false);
  });
});
