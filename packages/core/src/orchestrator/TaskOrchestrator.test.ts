/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';
import {
  OrchestratorState,
  TaskOrchestrator,
  type AuthenticationHandler,
} from './TaskOrchestrator.js';
import { RetryBudget } from './RetryBudget.js';
import { StreamingChannel } from '../streaming/StreamingChannel.js';
import { statusEvent } from '../streaming/types.js';
import { CredentialStore } from '../auth/CredentialStore.js';
import { AgentSession } from '../session/AgentSession.js';
import { drain, scriptedTask, textResult } from '../test-utils/fakes.js';

function gateReturning(outcome: boolean | Error) {
  const handleAuthentication = vi.fn(async () => {
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  });
  const gate: AuthenticationHandler = { handleAuthentication };
  return { gate, handleAuthentication };
}

function setup(
  outcomes: Array<string | Error>,
  gateOutcome: boolean | Error = true,
) {
  const { task, invoke } = scriptedTask(...outcomes);
  const { gate, handleAuthentication } = gateReturning(gateOutcome);
  const channel = new StreamingChannel();
  const context = { session: new AgentSession('s1', new CredentialStore()) };
  const orchestrator = new TaskOrchestrator({ task, channel, gate, context });
  return { orchestrator, channel, invoke, handleAuthentication, context };
}

describe('TaskOrchestrator', () => {
  it('emits the result directly when no authentication is needed', async () => {
    const { orchestrator, channel, invoke, handleAuthentication, context } =
      setup(['Page created successfully']);

    await orchestrator.run('create a page');

    expect(await drain(channel)).toEqual([
      statusEvent('Begin agent execution'),
      { type: 'result', result: textResult('Page created successfully') },
      statusEvent('End agent execution'),
    ]);
    expect(invoke).toHaveBeenCalledTimes(1);
    expect(invoke).toHaveBeenCalledWith('create a page', context);
    expect(handleAuthentication).not.toHaveBeenCalled();
    expect(orchestrator.state).toBe(OrchestratorState.CLOSED);
    expect(channel.finished).toBe(true);
  });

  it('retries once and emits the second result after authenticating', async () => {
    const { orchestrator, channel, invoke, handleAuthentication } = setup([
      'Please sign in first',
      'Found 2 pages',
    ]);

    await orchestrator.run('find pages');

    expect(invoke).toHaveBeenCalledTimes(2);
    expect(invoke.mock.calls[1][0]).toBe('find pages');
    expect(handleAuthentication).toHaveBeenCalledTimes(1);
    expect(await drain(channel)).toEqual([
      statusEvent('Begin agent execution'),
      { type: 'result', result: textResult('Found 2 pages') },
      statusEvent('End agent execution'),
    ]);
  });

  it('emits the first result when authentication fails', async () => {
    const { orchestrator, channel, invoke } = setup(
      ['Please sign in first', 'unused'],
      false,
    );

    await orchestrator.run('find pages');

    expect(invoke).toHaveBeenCalledTimes(1);
    const events = await drain(channel);
    expect(events[1]).toEqual({
      type: 'result',
      result: textResult('Please sign in first'),
    });
  });

  it('does not retry a second time when the retry still needs auth', async () => {
    const { orchestrator, channel, invoke, handleAuthentication } = setup([
      'login required',
      'login still required',
    ]);

    await orchestrator.run('find pages');

    expect(invoke).toHaveBeenCalledTimes(2);
    expect(handleAuthentication).toHaveBeenCalledTimes(1);
    const events = await drain(channel);
    expect(events[1]).toEqual({
      type: 'result',
      result: textResult('login still required'),
    });
  });

  it('skips authentication when the retry budget is spent', async () => {
    const { task, invoke } = scriptedTask('login required');
    const { gate, handleAuthentication } = gateReturning(true);
    const channel = new StreamingChannel();
    const budget = new RetryBudget(0);
    const orchestrator = new TaskOrchestrator({
      task,
      channel,
      gate,
      context: { session: new AgentSession('s1', new CredentialStore()) },
      retryBudget: budget,
    });

    await orchestrator.run('find pages');

    expect(invoke).toHaveBeenCalledTimes(1);
    expect(handleAuthentication).not.toHaveBeenCalled();
  });

  it('converts a task exception into an error status and closes', async () => {
    const { orchestrator, channel } = setup([new Error('model unavailable')]);

    await expect(orchestrator.run('find pages')).resolves.toBeUndefined();

    expect(await drain(channel)).toEqual([
      statusEvent('Begin agent execution'),
      statusEvent('Error: model unavailable', 'error'),
    ]);
    expect(channel.finished).toBe(true);
  });

  it('converts a failure during the retry into an error status', async () => {
    const { orchestrator, channel } = setup([
      'Please sign in first',
      new Error('rate limited'),
    ]);

    await orchestrator.run('find pages');

    expect((await drain(channel)).at(-1)).toEqual(
      statusEvent('Error: rate limited', 'error'),
    );
  });

  it('converts a gate exception into an error status', async () => {
    const { orchestrator, channel } = setup(
      ['Please sign in first'],
      new Error('gate exploded'),
    );

    await orchestrator.run('find pages');

    expect((await drain(channel)).at(-1)).toEqual(
      statusEvent('Error: gate exploded', 'error'),
    );
  });
});

describe('RetryBudget', () => {
  it('allows exactly capacity retries', () => {
    const budget = new RetryBudget(1);

    expect(budget.consume()).toBe(true);
    expect(budget.consume()).toBe(false);
    expect(budget.remaining).toBe(0);
  });
});
