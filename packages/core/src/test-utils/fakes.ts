/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { vi } from 'vitest';
import type { AgentResult, AgentTask } from '../agent/types.js';
import type {
  AccessTokenRequest,
  AuthorizationProvider,
  Credential,
} from '../auth/types.js';
import type { StreamingChannel } from '../streaming/StreamingChannel.js';
import type { StreamEvent } from '../streaming/types.js';

export function textResult(text: string): AgentResult {
  return {
    message: { role: 'assistant', content: [{ type: 'text', text }] },
    stopReason: 'end_turn',
  };
}

/**
 * Task whose successive invocations resolve to the given texts; an `Error`
 * entry makes that invocation reject.
 */
export function scriptedTask(...outcomes: Array<string | Error>) {
  let call = 0;
  const invoke = vi.fn<AgentTask['invoke']>(async () => {
    const outcome = outcomes[Math.min(call, outcomes.length - 1)];
    call += 1;
    if (outcome instanceof Error) {
      throw outcome;
    }
    return textResult(outcome);
  });
  const task: AgentTask = { invoke };
  return { task, invoke };
}

export function fakeProvider(
  behaviour: (request: AccessTokenRequest) => Promise<string>,
) {
  const requestAccessToken = vi.fn(behaviour);
  const provider: AuthorizationProvider = {
    name: 'fake',
    requestAccessToken,
  };
  return { provider, requestAccessToken };
}

export function testCredential(tenantId = 'cloud-test'): Credential {
  return {
    accessToken: 'test-token',
    tenantId,
    metadata: {},
    obtainedAt: 0,
  };
}

export async function drain(
  channel: StreamingChannel,
): Promise<StreamEvent[]> {
  if (!channel.finished) {
    channel.finish();
  }
  const events: StreamEvent[] = [];
  for await (const event of channel.stream()) {
    events.push(event);
  }
  return events;
}
