/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Tool name constants, importable without pulling in the tool
 * implementations.
 */
export const SEARCH_CONFLUENCE_TOOL = 'search_confluence_by_text';
export const GET_CONFLUENCE_PAGE_TOOL = 'get_confluence_page';
export const CREATE_CONFLUENCE_PAGE_TOOL = 'create_confluence_page';

export const CONFLUENCE_TOOL_NAMES = [
  SEARCH_CONFLUENCE_TOOL,
  GET_CONFLUENCE_PAGE_TOOL,
  CREATE_CONFLUENCE_PAGE_TOOL,
] as const;

export type ConfluenceToolName = (typeof CONFLUENCE_TOOL_NAMES)[number];
