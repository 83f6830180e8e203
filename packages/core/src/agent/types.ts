/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { AgentSession } from '../session/AgentSession.js';

export interface AgentContentBlock {
  type: string;
  text?: string;
  [key: string]: unknown;
}

export interface AgentMessage {
  role: 'assistant';
  content: AgentContentBlock[];
}

/**
 * Final outcome of one agent run. Only the text blocks of `message` are
 * inspected by the orchestrator; the whole object is streamed to the caller.
 */
export interface AgentResult {
  message: AgentMessage;
  stopReason?: string;
}

export interface InvocationContext {
  session: AgentSession;
  metadata?: Record<string, unknown>;
}

/**
 * The long-running unit of work the orchestrator drives. Failures are
 * signalled by rejecting.
 */
export interface AgentTask {
  invoke(prompt: string, context: InvocationContext): Promise<AgentResult>;
}

export function extractResponseText(result: AgentResult): string {
  return result.message.content
    .map((block) => (typeof block.text === 'string' ? block.text : ''))
    .join('');
}
