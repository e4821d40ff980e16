// Subscriber fan-out hub
//
// Broadcasts state change events to any number of subscribers. publish()
// never waits on a subscriber: each one has its own bounded queue, and a
// subscriber that falls behind loses its oldest events rather than slowing
// the ingestion loop.

import type { EntityState, StateChangeEvent } from '@rvlink/protocol';
import type { Logger } from '../logging.js';
import { describeError, silentLogger } from '../logging.js';
import type { HubMessage } from './subscription.js';
import { Subscription } from './subscription.js';

export const DEFAULT_SUBSCRIBER_CAPACITY = 256;

export type FanoutHubOptions = {
  /** Source of the initial snapshot */
  snapshot: () => EntityState[];

  /** Default queue capacity per subscriber */
  capacity?: number;

  /** Called once per dropped event */
  onDrop?: (subscription: Subscription) => void;

  logger?: Logger;
};

export type SubscribeOptions = {
  capacity?: number;

  /** Deliver the current state of every entity first */
  snapshot?: boolean;
};

/**
 * Receives messages from attach(). Throwing or rejecting disconnects the
 * subscriber.
 */
export type HubSink = (message: HubMessage) => void | Promise<void>;

export type HubStats = {
  subscribers: number;
  published: number;
  dropped: number;
};

export class FanoutHub {
  private subscriptions = new Set<Subscription>();
  private nextId = 0;
  private published = 0;
  private dropped = 0;
  private takeSnapshot: () => EntityState[];
  private capacity: number;
  private onDrop?: (subscription: Subscription) => void;
  private logger: Logger;

  constructor(options: FanoutHubOptions) {
    const { snapshot, capacity = DEFAULT_SUBSCRIBER_CAPACITY, onDrop, logger = silentLogger } = options;
    this.takeSnapshot = snapshot;
    this.capacity = capacity;
    this.onDrop = onDrop;
    this.logger = logger;
  }

  /**
   * Register a subscriber. The snapshot, when requested, is taken now, so it
   * precedes every event published after this call.
   */
  subscribe(options: SubscribeOptions = {}): Subscription {
    const { capacity = this.capacity, snapshot = false } = options;
    const subscription = new Subscription(
      ++this.nextId,
      capacity,
      snapshot ? this.takeSnapshot() : null,
      (closed) => {
        this.subscriptions.delete(closed);
      }
    );
    this.subscriptions.add(subscription);

    this.logger.debug('Subscriber added', { id: subscription.id, capacity: subscription.capacity });
    return subscription;
  }

  /**
   * @returns true if the subscription was registered
   */
  unsubscribe(subscription: Subscription): boolean {
    const registered = this.subscriptions.has(subscription);
    subscription.close();
    if (registered) {
      this.logger.debug('Subscriber removed', { id: subscription.id, dropped: subscription.dropped });
    }
    return registered;
  }

  /**
   * Offer an event to every subscriber without blocking.
   */
  publish(event: StateChangeEvent): void {
    this.published++;
    for (const subscription of this.subscriptions) {
      if (subscription.push(event)) {
        this.dropped++;
        this.onDrop?.(subscription);
      }
    }
  }

  /**
   * Deliver a subscription's messages to a sink until the subscription ends.
   * A failing sink disconnects the subscriber; the returned promise still
   * resolves.
   */
  async attach(subscription: Subscription, sink: HubSink): Promise<void> {
    try {
      for await (const message of subscription) {
        await sink(message);
      }
    } catch (error) {
      this.logger.warn('Subscriber disconnected', { id: subscription.id, ...describeError(error) });
    } finally {
      this.unsubscribe(subscription);
    }
  }

  stats(): HubStats {
    return {
      subscribers: this.subscriptions.size,
      published: this.published,
      dropped: this.dropped,
    };
  }

  /**
   * Close every subscription.
   */
  close(): void {
    for (const subscription of Array.from(this.subscriptions)) {
      subscription.close();
    }
  }
}
