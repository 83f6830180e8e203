/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type Anthropic from '@anthropic-ai/sdk';
import { DebugLogger } from '../debug/index.js';
import type { ConfluenceToolset } from '../tools/confluence-tools.js';
import type {
  AgentContentBlock,
  AgentResult,
  AgentTask,
  InvocationContext,
} from './types.js';

const logger = new DebugLogger('pagewright:agent');

export const DEFAULT_MODEL = 'claude-3-7-sonnet-20250219';
export const DEFAULT_MAX_TURNS = 10;

export const SYSTEM_PROMPT = `You are an agent that works in the user's Atlassian Confluence.
Based on the user's request you search Confluence pages and create new pages.

Capabilities:
- Text search: find pages by keyword
- Page details: show the content of a specific page
- Page creation: create a new Confluence page

When an operation is finished, report the result clearly.`;

export type AgentTurn = Pick<Anthropic.Message, 'content' | 'stop_reason'>;

/**
 * The part of the Anthropic client the agent uses.
 */
export interface MessagesClient {
  messages: {
    create(
      params: Anthropic.MessageCreateParamsNonStreaming,
    ): Promise<AgentTurn>;
  };
}

export interface ConfluenceAgentOptions {
  client: MessagesClient;
  toolset: ConfluenceToolset;
  model?: string;
  maxTokens?: number;
  maxTurns?: number;
}

/**
 * Tool-use loop over the Messages API. Tools run sequentially in the order
 * the model requested them; the first response that does not ask for a tool
 * is the result.
 */
export class ConfluenceAgent implements AgentTask {
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly maxTurns: number;

  constructor(private readonly options: ConfluenceAgentOptions) {
    this.model = options.model ?? DEFAULT_MODEL;
    this.maxTokens = options.maxTokens ?? 4096;
    this.maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
  }

  async invoke(
    prompt: string,
    context: InvocationContext,
  ): Promise<AgentResult> {
    const messages: Anthropic.MessageParam[] = [
      { role: 'user', content: prompt },
    ];

    for (let turn = 0; turn < this.maxTurns; turn++) {
      const response = await this.options.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        system: SYSTEM_PROMPT,
        tools: this.options.toolset.definitions(),
        messages,
      });

      if (response.stop_reason !== 'tool_use') {
        return toAgentResult(response);
      }

      messages.push({ role: 'assistant', content: response.content });
      const toolResults: Anthropic.ToolResultBlockParam[] = [];
      for (const block of response.content) {
        if (block.type !== 'tool_use') {
          continue;
        }
        logger.debug(() => `Turn ${turn}: running ${block.name}`);
        const output = await this.options.toolset.run(
          block.name,
          block.input,
          context.session,
        );
        toolResults.push({
          type: 'tool_result',
          tool_use_id: block.id,
          content: output,
        });
      }
      messages.push({ role: 'user', content: toolResults });
    }

    throw new Error(
      `Agent did not produce a final answer within ${this.maxTurns} turns`,
    );
  }
}

function toAgentResult(response: AgentTurn): AgentResult {
  const content: AgentContentBlock[] = response.content.map((block) =>
    block.type === 'text'
      ? { type: 'text', text: block.text }
      : { type: block.type },
  );
  return {
    message: { role: 'assistant', content },
    stopReason: response.stop_reason ?? undefined,
  };
}
