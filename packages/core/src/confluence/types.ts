/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

export const CONFLUENCE_API_BASE = 'https://api.atlassian.com/ex/confluence';

export const ContentSearchResponseSchema = z
  .object({
    totalSize: z.number().optional(),
    results: z
      .array(
        z
          .object({
            id: z.string(),
            title: z.string(),
            space: z.object({ name: z.string().optional() }).passthrough().optional(),
            excerpt: z.string().optional(),
            _links: z.object({ webui: z.string() }).passthrough(),
          })
          .passthrough(),
      )
      .default([]),
  })
  .passthrough();

export const PageResponseSchema = z
  .object({
    id: z.string(),
    title: z.string().optional(),
    spaceId: z.string().optional(),
    status: z.string().optional(),
    version: z.object({ number: z.number() }).passthrough().optional(),
    body: z
      .object({
        storage: z.object({ value: z.string().optional() }).passthrough().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const SpaceListResponseSchema = z
  .object({
    results: z.array(z.object({ id: z.string() }).passthrough()).default([]),
  })
  .passthrough();

export interface PageSummary {
  id: string;
  title: string;
  space: string;
  excerpt: string;
  url: string;
}

export interface SearchResult {
  total: number;
  pages: PageSummary[];
}

export interface PageDetail {
  id: string;
  title?: string;
  spaceId?: string;
  version: number;
  content: string;
  status?: string;
}

export interface CreatePageInput {
  spaceKey: string;
  title: string;
  content: string;
  parentId?: string;
}

export interface CreatedPage {
  id: string;
  title?: string;
  spaceId: string;
}
