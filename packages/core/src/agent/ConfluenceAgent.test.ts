/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';
import type Anthropic from '@anthropic-ai/sdk';
import {
  ConfluenceAgent,
  DEFAULT_MODEL,
  SYSTEM_PROMPT,
  type AgentTurn,
  type MessagesClient,
} from './ConfluenceAgent.js';
import { ConfluenceToolset } from '../tools/confluence-tools.js';
import { CredentialStore } from '../auth/CredentialStore.js';
import { AgentSession } from '../session/AgentSession.js';

function textTurn(text: string): AgentTurn {
  const block: Anthropic.TextBlock = { type: 'text', text, citations: null };
  return { content: [block], stop_reason: 'end_turn' };
}

function toolTurn(name: string, input: unknown): AgentTurn {
  const block: Anthropic.ToolUseBlock = {
    type: 'tool_use',
    id: 'toolu_1',
    name,
    input,
  };
  return { content: [block], stop_reason: 'tool_use' };
}

function setup(...turns: AgentTurn[]) {
  const create = vi.fn<MessagesClient['messages']['create']>();
  for (const turn of turns) {
    create.mockResolvedValueOnce(turn);
  }
  const session = new AgentSession('s1', new CredentialStore());
  return { create, session, client: { messages: { create } } };
}

describe('ConfluenceAgent', () => {
  it('returns the first answer that does not request a tool', async () => {
    const { create, session, client } = setup(textTurn('Hello'));
    const agent = new ConfluenceAgent({
      client,
      toolset: new ConfluenceToolset(),
    });

    const result = await agent.invoke('hi', { session });

    expect(result).toEqual({
      message: { role: 'assistant', content: [{ type: 'text', text: 'Hello' }] },
      stopReason: 'end_turn',
    });
    expect(create).toHaveBeenCalledTimes(1);
    const params = create.mock.calls[0][0];
    expect(params.model).toBe(DEFAULT_MODEL);
    expect(params.system).toBe(SYSTEM_PROMPT);
    expect(params.messages).toEqual([{ role: 'user', content: 'hi' }]);
    expect(params.tools?.map((tool) => tool.name)).toEqual([
      'search_confluence_by_text',
      'get_confluence_page',
      'create_confluence_page',
    ]);
  });

  it('runs requested tools and feeds their output back', async () => {
    const { create, session, client } = setup(
      toolTurn('get_confluence_page', { page_id: '42' }),
      textTurn('Please sign in to Atlassian.'),
    );
    const agent = new ConfluenceAgent({
      client,
      toolset: new ConfluenceToolset(),
      model: 'test-model',
    });

    const result = await agent.invoke('show page 42', { session });

    expect(result.message.content).toEqual([
      { type: 'text', text: 'Please sign in to Atlassian.' },
    ]);
    expect(session.lastToolName).toBe('get_confluence_page');
    expect(create).toHaveBeenCalledTimes(2);
    const second = create.mock.calls[1][0];
    expect(second.model).toBe('test-model');
    expect(second.messages).toHaveLength(3);
    expect(second.messages[2]).toEqual({
      role: 'user',
      content: [
        {
          type: 'tool_result',
          tool_use_id: 'toolu_1',
          content: JSON.stringify({
            auth_required: true,
            message:
              'Atlassian authentication is required for get_confluence_page.',
          }),
        },
      ],
    });
  });

  it('gives up after the configured number of turns', async () => {
    const { session, client } = setup(
      toolTurn('get_confluence_page', { page_id: '1' }),
      toolTurn('get_confluence_page', { page_id: '2' }),
    );
    const agent = new ConfluenceAgent({
      client,
      toolset: new ConfluenceToolset(),
      maxTurns: 2,
    });

    await expect(agent.invoke('loop', { session })).rejects.toThrow(
      'Agent did not produce a final answer within 2 turns',
    );
  });

  it('propagates client failures', async () => {
    const { create, session, client } = setup();
    create.mockRejectedValueOnce(new Error('overloaded'));
    const agent = new ConfluenceAgent({
      client,
      toolset: new ConfluenceToolset(),
    });

    await expect(agent.invoke('hi', { session })).rejects.toThrow(
      'overloaded',
    );
  });

  it('offers tool definitions the Messages API accepts', () => {
    const tools: Anthropic.Tool[] = new ConfluenceToolset().definitions();

    expect(tools.map((tool) => tool.name)).toEqual([
      'search_confluence_by_text',
      'get_confluence_page',
      'create_confluence_page',
    ]);
    expect(tools[1].input_schema).toEqual({
      type: 'object',
      properties: {
        page_id: { type: 'string', description: 'Confluence page id' },
      },
      required: ['page_id'],
    });
  });
});
