/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { DebugLogger } from './debug/index.js';
import type { AgentTask } from './agent/types.js';
import {
  AuthenticationGate,
  type AuthenticationGateOptions,
} from './auth/AuthenticationGate.js';
import {
  DEFAULT_SESSION_ID,
  type CredentialStore,
} from './auth/CredentialStore.js';
import { TaskOrchestrator } from './orchestrator/TaskOrchestrator.js';
import { AgentSession } from './session/AgentSession.js';
import { StreamingChannel } from './streaming/StreamingChannel.js';
import type { StreamEvent } from './streaming/types.js';

const logger = new DebugLogger('pagewright:invocation');

export const NO_PROMPT_MESSAGE = 'No prompt found in input';

export const InvocationPayloadSchema = z
  .object({
    prompt: z.string().optional(),
    sessionId: z.string().min(1).optional(),
  })
  .passthrough();

export type InvocationPayload = z.infer<typeof InvocationPayloadSchema>;

export interface InvocationDependencies {
  task: AgentTask;
  credentials: CredentialStore;
  auth: AuthenticationGateOptions;
}

/**
 * Starts the agent for `payload` in the background and returns the lazy
 * sequence of its events. The sequence ends after the channel closes and the
 * background run has settled.
 */
export function invokeAgent(
  payload: unknown,
  deps: InvocationDependencies,
): AsyncGenerator<StreamEvent, void, undefined> {
  const parsed = InvocationPayloadSchema.safeParse(payload);
  const prompt =
    (parsed.success ? parsed.data.prompt : undefined) ?? NO_PROMPT_MESSAGE;
  const sessionId =
    parsed.success && parsed.data.sessionId
      ? parsed.data.sessionId
      : DEFAULT_SESSION_ID;

  const channel = new StreamingChannel();
  const session = new AgentSession(sessionId, deps.credentials);
  const gate = new AuthenticationGate(deps.auth, session, channel);
  const orchestrator = new TaskOrchestrator({
    task: deps.task,
    channel,
    gate,
    context: { session },
  });

  logger.debug(() => `Starting invocation for session ${sessionId}`);
  const running = orchestrator.run(prompt);
  return streamWithTask(channel, running);
}

async function* streamWithTask(
  channel: StreamingChannel,
  running: Promise<void>,
): AsyncGenerator<StreamEvent, void, undefined> {
  yield* channel.stream();
  await running;
}
