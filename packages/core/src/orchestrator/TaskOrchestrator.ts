/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/index.js';
import { getErrorMessage } from '../utils/errors.js';
import { needsAuthentication as defaultClassifier } from '../auth/needsAuthentication.js';
import type { StreamingChannel } from '../streaming/StreamingChannel.js';
import { statusEvent } from '../streaming/types.js';
import {
  extractResponseText,
  type AgentResult,
  type AgentTask,
  type InvocationContext,
} from '../agent/types.js';
import { RetryBudget } from './RetryBudget.js';

const logger = new DebugLogger('pagewright:orchestrator');

export enum OrchestratorState {
  INIT = 'init',
  EXECUTING = 'executing',
  NEEDS_AUTH = 'needs_auth',
  AUTHENTICATING = 'authenticating',
  RETRYING = 'retrying',
  AUTH_FAILED = 'auth_failed',
  SUCCESS = 'success',
  FAILURE = 'failure',
  CLOSED = 'closed',
}

export const BEGIN_MESSAGE = 'Begin agent execution';
export const END_MESSAGE = 'End agent execution';

export interface AuthenticationHandler {
  handleAuthentication(): Promise<boolean>;
}

export interface TaskOrchestratorOptions {
  task: AgentTask;
  channel: StreamingChannel;
  gate: AuthenticationHandler;
  context: InvocationContext;
  classify?: (text: string) => boolean;
  retryBudget?: RetryBudget;
}

/**
 * Runs one invocation: execute, re-authenticate and retry once when the
 * output reads as an auth failure, then publish the result and close the
 * channel. `run` never rejects; the channel is always finished.
 */
export class TaskOrchestrator {
  private readonly classify: (text: string) => boolean;
  private readonly retryBudget: RetryBudget;
  private _state = OrchestratorState.INIT;

  constructor(private readonly options: TaskOrchestratorOptions) {
    this.classify = options.classify ?? defaultClassifier;
    this.retryBudget = options.retryBudget ?? new RetryBudget(1);
  }

  get state(): OrchestratorState {
    return this._state;
  }

  async run(prompt: string): Promise<void> {
    const { channel } = this.options;
    try {
      channel.put(statusEvent(BEGIN_MESSAGE));
      const result = await this.execute(prompt);
      channel.put({ type: 'result', result });
      channel.put(statusEvent(END_MESSAGE));
    } catch (error) {
      this.transition(OrchestratorState.FAILURE);
      logger.error(() => `Invocation failed: ${getErrorMessage(error)}`);
      channel.put(statusEvent(`Error: ${getErrorMessage(error)}`, 'error'));
    } finally {
      this.transition(OrchestratorState.CLOSED);
      channel.finish();
    }
  }

  private async execute(prompt: string): Promise<AgentResult> {
    this.transition(OrchestratorState.EXECUTING);
    const first = await this.invokeTask(prompt);

    if (!this.classify(extractResponseText(first))) {
      this.transition(OrchestratorState.SUCCESS);
      return first;
    }

    this.transition(OrchestratorState.NEEDS_AUTH);
    if (!this.retryBudget.canRetry()) {
      return first;
    }

    this.transition(OrchestratorState.AUTHENTICATING);
    if (!(await this.options.gate.handleAuthentication())) {
      this.transition(OrchestratorState.AUTH_FAILED);
      return first;
    }

    this.retryBudget.consume();
    logger.debug(
      () =>
        `Retrying after authentication, ${this.retryBudget.remaining} retries left`,
    );
    this.transition(OrchestratorState.RETRYING);
    // The retried result is final even if it still reads as an auth failure.
    const second = await this.invokeTask(prompt);
    this.transition(OrchestratorState.SUCCESS);
    return second;
  }

  private invokeTask(prompt: string): Promise<AgentResult> {
    return this.options.task.invoke(prompt, this.options.context);
  }

  private transition(next: OrchestratorState): void {
    logger.debug(() => `${this._state} -> ${next}`);
    this._state = next;
  }
}
