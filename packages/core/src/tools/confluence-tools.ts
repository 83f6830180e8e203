/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { DebugLogger } from '../debug/index.js';
import { ConfluenceClient } from '../confluence/ConfluenceClient.js';
import {
  ConfluenceApiError,
  SpaceNotFoundError,
} from '../confluence/errors.js';
import type { AgentSession } from '../session/AgentSession.js';
import { getErrorMessage } from '../utils/errors.js';
import {
  CREATE_CONFLUENCE_PAGE_TOOL,
  GET_CONFLUENCE_PAGE_TOOL,
  SEARCH_CONFLUENCE_TOOL,
} from './tool-names.js';

const logger = new DebugLogger('pagewright:tools:confluence');

/** JSON Schema handed to the model for a tool's input. */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
}

export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: ToolInputSchema;
}

interface ConfluenceTool<S extends z.ZodTypeAny> {
  definition: ToolDefinition;
  params: S;
  execute(
    params: z.infer<S>,
    client: ConfluenceClient,
  ): Promise<Record<string, unknown>>;
}

function defineTool<S extends z.ZodTypeAny>(
  tool: ConfluenceTool<S>,
): ConfluenceTool<S> {
  return tool;
}

const SearchParams = z.object({
  search_text: z.string().min(1),
  limit: z.number().int().positive().max(100).default(10),
});

const GetPageParams = z.object({
  page_id: z.string().min(1),
});

const CreatePageParams = z.object({
  space_key: z.string().min(1),
  title: z.string().min(1),
  content: z.string(),
  parent_id: z.string().min(1).optional(),
});

const searchTool = defineTool({
  definition: {
    name: SEARCH_CONFLUENCE_TOOL,
    description: 'Search Confluence pages by keyword in title or body text.',
    input_schema: {
      type: 'object',
      properties: {
        search_text: { type: 'string', description: 'Text to search for' },
        limit: {
          type: 'integer',
          description: 'Maximum number of pages to return (default 10)',
        },
      },
      required: ['search_text'],
    },
  },
  params: SearchParams,
  async execute(params, client) {
    const result = await client.searchPages(params.search_text, params.limit);
    return { success: true, search_text: params.search_text, ...result };
  },
});

const getPageTool = defineTool({
  definition: {
    name: GET_CONFLUENCE_PAGE_TOOL,
    description: 'Fetch the details and storage-format body of a page by id.',
    input_schema: {
      type: 'object',
      properties: {
        page_id: { type: 'string', description: 'Confluence page id' },
      },
      required: ['page_id'],
    },
  },
  params: GetPageParams,
  async execute(params, client) {
    return { success: true, page: await client.getPage(params.page_id) };
  },
});

const createPageTool = defineTool({
  definition: {
    name: CREATE_CONFLUENCE_PAGE_TOOL,
    description:
      'Create a Confluence page in a space. Plain text content is wrapped in a paragraph.',
    input_schema: {
      type: 'object',
      properties: {
        space_key: { type: 'string', description: 'Key of the target space' },
        title: { type: 'string', description: 'Page title' },
        content: {
          type: 'string',
          description: 'Page body, storage-format XHTML or plain text',
        },
        parent_id: {
          type: 'string',
          description: 'Optional id of the parent page',
        },
      },
      required: ['space_key', 'title', 'content'],
    },
  },
  params: CreatePageParams,
  async execute(params, client) {
    const page = await client.createPage({
      spaceKey: params.space_key,
      title: params.title,
      content: params.content,
      parentId: params.parent_id,
    });
    return {
      success: true,
      message: `Created page: ${page.title ?? params.title}`,
      page_id: page.id,
      page_title: page.title,
      space_id: page.spaceId,
    };
  },
});

export function createAuthRequiredResponse(toolName: string): string {
  return JSON.stringify({
    auth_required: true,
    message: `Atlassian authentication is required for ${toolName}.`,
  });
}

export function createErrorResponse(error: string, details = ''): string {
  return JSON.stringify({ success: false, error, details });
}

/**
 * The Confluence tools offered to the agent. Every result is JSON text the
 * model reads back; failures are reported in-band, never thrown.
 */
export class ConfluenceToolset {
  private readonly tools: Map<string, ConfluenceTool<z.ZodTypeAny>> =
    new Map();

  constructor(
    private readonly clientFactory: (
      session: AgentSession,
    ) => ConfluenceClient | null = defaultClientFactory,
  ) {
    for (const tool of [searchTool, getPageTool, createPageTool]) {
      this.tools.set(tool.definition.name, tool);
    }
  }

  definitions(): ToolDefinition[] {
    return [...this.tools.values()].map((tool) => tool.definition);
  }

  async run(
    name: string,
    input: unknown,
    session: AgentSession,
  ): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      return createErrorResponse(`Unknown tool: ${name}`);
    }
    session.lastToolName = name;

    const client = this.clientFactory(session);
    if (!client) {
      return createAuthRequiredResponse(name);
    }

    const params = tool.params.safeParse(input);
    if (!params.success) {
      return createErrorResponse(
        `Invalid parameters for ${name}`,
        params.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; '),
      );
    }

    try {
      return JSON.stringify(await tool.execute(params.data, client));
    } catch (error) {
      logger.warn(() => `${name} failed: ${getErrorMessage(error)}`);
      if (error instanceof ConfluenceApiError) {
        return createErrorResponse(error.message, error.details);
      }
      if (error instanceof SpaceNotFoundError) {
        return createErrorResponse(
          error.message,
          'The specified space key was not found',
        );
      }
      return createErrorResponse(`${name} failed`, getErrorMessage(error));
    }
  }
}

function defaultClientFactory(session: AgentSession): ConfluenceClient | null {
  const credential = session.credential;
  return credential ? new ConfluenceClient(credential) : null;
}
