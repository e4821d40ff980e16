// Hub subscription - one subscriber's bounded FIFO of messages

import type { EntityState, StateChangeEvent } from '@rvlink/protocol';

/**
 * What a subscriber receives.
 *
 * - snapshot: every entity state at subscribe time, always first
 * - event: one state change
 * - drop: events were discarded since the last message because the
 *   subscriber fell behind; `dropped` is the subscriber's running total
 */
export type HubMessage =
  | { type: 'snapshot'; states: EntityState[] }
  | { type: 'event'; event: StateChangeEvent }
  | { type: 'drop'; dropped: number };

export class Subscription implements AsyncIterableIterator<HubMessage> {
  readonly id: number;
  readonly capacity: number;

  private queue: StateChangeEvent[] = [];
  private snapshot: EntityState[] | null;
  private droppedCount = 0;
  private unreportedDrops = 0;
  private isClosed = false;
  private waiter: ((result: IteratorResult<HubMessage>) => void) | null = null;
  private onClose: (subscription: Subscription) => void;

  constructor(
    id: number,
    capacity: number,
    snapshot: EntityState[] | null,
    onClose: (subscription: Subscription) => void
  ) {
    this.id = id;
    this.capacity = Math.max(1, capacity);
    this.snapshot = snapshot;
    this.onClose = onClose;
  }

  /** Events discarded over the subscription's lifetime */
  get dropped(): number {
    return this.droppedCount;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Events waiting to be read */
  get size(): number {
    return this.queue.length;
  }

  /**
   * Enqueue an event without blocking. When the queue is full the oldest
   * event is discarded.
   *
   * @returns true if an event was dropped
   */
  push(event: StateChangeEvent): boolean {
    if (this.isClosed) {
      return false;
    }

    if (this.waiter && this.snapshot === null && this.unreportedDrops === 0) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ done: false, value: { type: 'event', event } });
      return false;
    }

    let dropped = false;
    if (this.queue.length >= this.capacity) {
      this.queue.shift();
      this.droppedCount++;
      this.unreportedDrops++;
      dropped = true;
    }
    this.queue.push(event);
    return dropped;
  }

  next(): Promise<IteratorResult<HubMessage>> {
    const message = this.take();
    if (message) {
      return Promise.resolve({ done: false, value: message });
    }
    if (this.isClosed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /**
   * Called when a for-await loop exits early. Closes the subscription.
   */
  async return(): Promise<IteratorResult<HubMessage>> {
    this.close();
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<HubMessage> {
    return this;
  }

  /**
   * End the subscription and release its queue. A pending next() resolves
   * as done.
   */
  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    this.queue = [];
    this.snapshot = null;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ done: true, value: undefined });
    }
    this.onClose(this);
  }

  private take(): HubMessage | null {
    if (this.snapshot !== null) {
      const states = this.snapshot;
      this.snapshot = null;
      return { type: 'snapshot', states };
    }
    if (this.unreportedDrops > 0) {
      this.unreportedDrops = 0;
      return { type: 'drop', dropped: this.droppedCount };
    }
    const event = this.queue.shift();
    return event ? { type: 'event', event } : null;
  }
}
