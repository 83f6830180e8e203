/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Counts re-authentication retries for one invocation. The orchestrator
 * uses a capacity of one: after a single authenticate-and-retry cycle the
 * retried result is returned as-is, even if it again reads as an auth
 * failure.
 */
export class RetryBudget {
  private used = 0;

  constructor(readonly capacity: number = 1) {}

  get remaining(): number {
    return this.capacity - this.used;
  }

  canRetry(): boolean {
    return this.used < this.capacity;
  }

  /**
   * Takes one retry. Returns false, without consuming, when none is left.
   */
  consume(): boolean {
    if (!this.canRetry()) {
      return false;
    }
    this.used += 1;
    return true;
  }
}
