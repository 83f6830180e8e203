/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/index.js';
import type { StreamEvent } from './types.js';

const logger = new DebugLogger('pagewright:streaming:channel');

const END_OF_STREAM: unique symbol = Symbol('end-of-stream');

type Slot<T> = T | typeof END_OF_STREAM;

/**
 * Ordered, unbounded pipe between one producer and one consumer.
 *
 * `put` never waits. `finish` enqueues a single terminal sentinel after
 * everything already put, so the consumer sees every event before the stream
 * ends. A channel belongs to one invocation and can be streamed only once.
 */
export class StreamingChannel<T extends {} = StreamEvent> {
  private readonly buffer: Array<Slot<T>> = [];
  private readonly waiters: Array<(slot: Slot<T>) => void> = [];
  private _finished = false;
  private streamed = false;

  get finished(): boolean {
    return this._finished;
  }

  put(event: T): void {
    if (this._finished) {
      logger.warn(() => 'Dropping event put after finish()');
      return;
    }
    this.enqueue(event);
  }

  finish(): void {
    if (this._finished) {
      logger.warn(() => 'finish() called more than once');
      return;
    }
    this._finished = true;
    this.enqueue(END_OF_STREAM);
  }

  stream(): AsyncGenerator<T, void, undefined> {
    if (this.streamed) {
      throw new Error('StreamingChannel can only be streamed once');
    }
    this.streamed = true;
    return this.drain();
  }

  private async *drain(): AsyncGenerator<T, void, undefined> {
    while (true) {
      const slot = await this.take();
      // Only the sentinel of a finished channel ends the stream.
      if (slot === END_OF_STREAM && this._finished) {
        return;
      }
      if (slot !== END_OF_STREAM) {
        yield slot;
      }
    }
  }

  private enqueue(slot: Slot<T>): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(slot);
      return;
    }
    this.buffer.push(slot);
  }

  private take(): Promise<Slot<T>> {
    const slot = this.buffer.shift();
    if (slot !== undefined) {
      return Promise.resolve(slot);
    }
    return new Promise<Slot<T>>((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
