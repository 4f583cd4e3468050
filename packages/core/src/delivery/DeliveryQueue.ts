import type { InboundMessage } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

import { QueueOverflow } from '../errors/index.js';
import { Deque } from '../pipe/Deque.js';
import { TypedEventEmitter } from '../pipe/TypedEventEmitter.js';
import { createLogger } from '../utils/logger.js';

export const DEFAULT_QUEUE_CAPACITY = 1_000;

export type PopResult =
  | { readonly done: false; readonly value: InboundMessage }
  | { readonly done: true; readonly reason: 'closed' | 'aborted' };

export interface DeliveryQueueEvents {
  /** A message was discarded to make room for a newer one. */
  overflow: (overflow: QueueOverflow) => void;
}

export interface DeliveryQueueOptions {
  /** @default 1000 */
  capacity?: number;
  logger?: Logger;
}

interface Waiter {
  resolve: (result: PopResult) => void;
  detach: () => void;
}

/**
 * Ordered hand-off from the transport's callbacks to application code.
 *
 * - `push()` never waits. When the buffer is full the oldest unconsumed
 *   message is dropped (a live feed prefers fresh messages), `dropped`
 *   increments and `overflow` is emitted.
 * - `pop()` resolves with the next message, or with `done` once the queue is
 *   closed and drained or the caller's signal aborts.
 * - One FIFO for all topics: messages come out in the order they went in.
 */
export class DeliveryQueue extends TypedEventEmitter<DeliveryQueueEvents> {
  private readonly buffer: Deque<InboundMessage>;
  private readonly waiters: Waiter[] = [];
  private droppedCount = 0;
  private isClosed = false;

  constructor(options: DeliveryQueueOptions = {}) {
    super(options.logger ?? createLogger('DeliveryQueue'));
    this.buffer = new Deque<InboundMessage>(options.capacity ?? DEFAULT_QUEUE_CAPACITY);
  }

  get capacity(): number {
    return this.buffer.capacity;
  }

  /** Messages waiting to be popped. */
  get size(): number {
    return this.buffer.length;
  }

  /** Total messages discarded by the overflow policy. */
  get dropped(): number {
    return this.droppedCount;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Enqueues a message, or hands it straight to the longest-waiting consumer.
   * Ignored after {@link close}.
   */
  push(message: InboundMessage): void {
    if (this.isClosed) {
      this.logger.debug(`push after close ignored (#${message.sequence})`);
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.detach();
      waiter.resolve({ done: false, value: message });
      return;
    }

    const evicted = this.buffer.push(message);
    if (evicted) {
      this.droppedCount++;
      this.emit('overflow', new QueueOverflow(evicted, this.droppedCount));
    }
  }

  /** Takes the next message without waiting. */
  tryPop(): InboundMessage | undefined {
    return this.buffer.shift();
  }

  /**
   * Waits for the next message.
   *
   * Resolves with `{ done: true, reason: 'aborted' }` if `signal` aborts first,
   * and with `{ done: true, reason: 'closed' }` once the queue is closed and
   * every buffered message has been taken.
   */
  pop(signal?: AbortSignal): Promise<PopResult> {
    const next = this.buffer.shift();
    if (next) return Promise.resolve({ done: false, value: next });
    if (this.isClosed) return Promise.resolve({ done: true, reason: 'closed' });
    if (signal?.aborted) return Promise.resolve({ done: true, reason: 'aborted' });

    return new Promise<PopResult>((resolve) => {
      const onAbort = () => {
        const at = this.waiters.indexOf(waiter);
        if (at !== -1) this.waiters.splice(at, 1);
        resolve({ done: true, reason: 'aborted' });
      };
      const waiter: Waiter = {
        resolve,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /**
   * Stops accepting messages and wakes every waiting consumer with
   * `{ done: true, reason: 'closed' }`. Buffered messages stay poppable.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.detach();
      waiter.resolve({ done: true, reason: 'closed' });
    }
  }

  /** Yields messages until the queue is closed and drained. */
  async *[Symbol.asyncIterator](): AsyncGenerator<InboundMessage, void, undefined> {
    for (;;) {
      const result = await this.pop();
      if (result.done) return;
      yield result.value;
    }
  }
}
