// Pull queue shared by bus implementations
//
// Producers push frames as they arrive; a single consumer pulls them with
// next(). A failure is delivered after any frames already buffered. The
// buffer is bounded: when no one has pulled for a while the oldest frames
// are discarded and counted.

import type { CanFrame } from '@rvlink/protocol';
import { ReceiveCancelledError } from './errors.js';

type Waiter = {
  resolve: (frame: CanFrame) => void;
  reject: (error: Error) => void;
};

/** About 2.5 s of a fully loaded 250 kbit/s bus */
export const DEFAULT_FRAME_QUEUE_CAPACITY = 4096;

export type FrameQueueOptions = {
  /** Most frames buffered before the oldest is discarded */
  capacity?: number;
};

export class FrameQueue {
  readonly capacity: number;

  private frames: CanFrame[] = [];
  private waiters: Waiter[] = [];
  private failure: Error | null = null;
  private droppedCount = 0;

  constructor(options: FrameQueueOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_FRAME_QUEUE_CAPACITY);
  }

  /**
   * Deliver a frame to the oldest waiting receiver, or buffer it.
   *
   * @returns false when the queue has already failed
   */
  push(frame: CanFrame): boolean {
    if (this.failure) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(frame);
      return true;
    }

    if (this.frames.length >= this.capacity) {
      this.frames.shift();
      this.droppedCount++;
    }
    this.frames.push(frame);
    return true;
  }

  /**
   * Fail the queue. Waiting receivers reject now; later receivers reject
   * once the buffer is drained. Only the first failure is kept.
   */
  fail(error: Error): void {
    if (this.failure) {
      return;
    }
    this.failure = error;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(error);
    }
  }

  get failed(): boolean {
    return this.failure !== null;
  }

  /** Frames discarded because the buffer was full */
  get dropped(): number {
    return this.droppedCount;
  }

  /** Number of buffered frames */
  get size(): number {
    return this.frames.length;
  }

  next(signal?: AbortSignal): Promise<CanFrame> {
    if (signal?.aborted) {
      return Promise.reject(new ReceiveCancelledError());
    }

    const frame = this.frames.shift();
    if (frame) {
      return Promise.resolve(frame);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise<CanFrame>((resolve, reject) => {
      const onAbort = () => {
        this.waiters = this.waiters.filter((candidate) => candidate !== waiter);
        reject(new ReceiveCancelledError());
      };

      const waiter: Waiter = {
        resolve: (received) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(received);
        },
        reject: (error) => {
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      };

      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
