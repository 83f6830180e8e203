/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/index.js';
import { createAuthHeaders } from '../auth/tenant-resolver.js';
import type { Credential } from '../auth/types.js';
import { fetchWithTimeout } from '../utils/fetch.js';
import { ConfluenceApiError, SpaceNotFoundError } from './errors.js';
import {
  CONFLUENCE_API_BASE,
  ContentSearchResponseSchema,
  PageResponseSchema,
  SpaceListResponseSchema,
  type CreatePageInput,
  type CreatedPage,
  type PageDetail,
  type SearchResult,
} from './types.js';

const logger = new DebugLogger('pagewright:confluence:client');

const HTTP_OK = 200;

/**
 * Escapes a value for use inside a single-quoted CQL string.
 */
export function escapeCql(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

/**
 * Storage-format bodies must be XHTML; plain text is wrapped in a paragraph.
 */
export function toStorageFormat(content: string): string {
  return content.startsWith('<') ? content : `<p>${content}</p>`;
}

/**
 * Thin client over the Confluence Cloud REST API (v1 search, v2 pages and
 * spaces) for one cloud id.
 */
export class ConfluenceClient {
  constructor(private readonly credential: Credential) {}

  private get wikiBase(): string {
    return `${CONFLUENCE_API_BASE}/${this.credential.tenantId}/wiki`;
  }

  async searchPages(text: string, limit = 10): Promise<SearchResult> {
    const escaped = escapeCql(text);
    const params = new URLSearchParams({
      cql: `type=page AND (title~'${escaped}' OR text~'${escaped}')`,
      limit: String(limit),
    });
    const data = await this.request(
      `${this.wikiBase}/rest/api/content/search?${params.toString()}`,
      { method: 'GET' },
      'Failed to search pages',
    );

    const result = ContentSearchResponseSchema.parse(data);
    return {
      total: result.totalSize ?? 0,
      pages: result.results.map((page) => ({
        id: page.id,
        title: page.title,
        space: page.space?.name ?? 'N/A',
        excerpt: page.excerpt ?? '',
        url: `https://${this.credential.tenantId}.atlassian.net/wiki${page._links.webui}`,
      })),
    };
  }

  async getPage(pageId: string): Promise<PageDetail> {
    const params = new URLSearchParams({ 'body-format': 'storage' });
    const data = await this.request(
      `${this.wikiBase}/api/v2/pages/${encodeURIComponent(pageId)}?${params.toString()}`,
      { method: 'GET' },
      'Failed to get page',
    );

    const page = PageResponseSchema.parse(data);
    return {
      id: page.id,
      title: page.title,
      spaceId: page.spaceId,
      version: page.version?.number ?? 1,
      content: page.body?.storage?.value ?? '',
      status: page.status,
    };
  }

  async getSpaceIdByKey(spaceKey: string): Promise<string | null> {
    const params = new URLSearchParams({ keys: spaceKey, limit: '1' });
    const response = await fetchWithTimeout(
      `${this.wikiBase}/api/v2/spaces?${params.toString()}`,
      { method: 'GET', headers: createAuthHeaders(this.credential.accessToken) },
    );
    if (response.status !== HTTP_OK) {
      logger.debug(() => `Space lookup returned ${response.status}`);
      return null;
    }
    const spaces = SpaceListResponseSchema.parse(await response.json());
    const [first] = spaces.results;
    return first ? first.id : null;
  }

  async createPage(input: CreatePageInput): Promise<CreatedPage> {
    const spaceId = await this.getSpaceIdByKey(input.spaceKey);
    if (!spaceId) {
      throw new SpaceNotFoundError(input.spaceKey);
    }

    const payload: Record<string, unknown> = {
      spaceId,
      status: 'current',
      title: input.title,
      body: {
        representation: 'storage',
        value: toStorageFormat(input.content),
      },
    };
    if (input.parentId) {
      payload['parentId'] = input.parentId;
    }

    const data = await this.request(
      `${this.wikiBase}/api/v2/pages`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
      },
      'Failed to create page',
    );

    const page = PageResponseSchema.parse(data);
    return { id: page.id, title: page.title, spaceId };
  }

  private async request(
    url: string,
    init: { method: string; headers?: Record<string, string>; body?: string },
    failureMessage: string,
  ): Promise<unknown> {
    const response = await fetchWithTimeout(url, {
      ...init,
      headers: {
        ...createAuthHeaders(this.credential.accessToken),
        ...init.headers,
      },
    });

    if (response.status !== HTTP_OK) {
      const details = await response.text();
      throw new ConfluenceApiError(
        `${failureMessage}: ${response.status}`,
        response.status,
        details,
      );
    }
    return response.json();
  }
}
