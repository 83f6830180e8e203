/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { AgentResult } from '../agent/types.js';

export type StatusLevel = 'info' | 'error';

export interface StatusEvent {
  type: 'status';
  message: string;
  level: StatusLevel;
}

/** Interactive consent is required; the caller opens `url` out-of-band. */
export interface AuthUrlEvent {
  type: 'auth_url';
  url: string;
}

export interface ResultEvent {
  type: 'result';
  result: AgentResult;
}

export type StreamEvent = StatusEvent | AuthUrlEvent | ResultEvent;

export function statusEvent(
  message: string,
  level: StatusLevel = 'info',
): StatusEvent {
  return { type: 'status', message, level };
}
