// Server-Sent Events stream of entity state changes
//
// Each connection holds one hub subscription. A message is only taken from
// the subscription once the socket has drained the previous one, so a
// client that reads slowly leaves events in the subscription's bounded
// queue, where the oldest are dropped, instead of buffering without limit.

import type { Writable } from 'node:stream';
import type { Request, RequestHandler, Response } from 'express';
import type { FanoutHub, HubMessage, Logger } from '@rvlink/runtime';
import { describeError, silentLogger } from '@rvlink/runtime';

export const HEARTBEAT_INTERVAL_MS = 30_000;

export type EventStreamOptions = {
  hub: FanoutHub;
  heartbeatMs?: number;
  logger?: Logger;
};

export type StreamEventsOptions = EventStreamOptions & {
  /** Send every current state before the first event */
  snapshot?: boolean;
};

/**
 * Format one SSE message.
 */
export function formatServerEvent(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

function formatHubMessage(message: HubMessage): string {
  switch (message.type) {
    case 'snapshot':
      return formatServerEvent('snapshot', message.states);
    case 'event':
      return formatServerEvent('state', message.event);
    case 'drop':
      return formatServerEvent('drop', { dropped: message.dropped });
  }
}

function isOpen(target: Writable): boolean {
  return !target.destroyed && !target.writableEnded;
}

/**
 * Resolves once the target can take more data or has gone away.
 */
function drained(target: Writable): Promise<void> {
  if (!isOpen(target)) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const done = () => {
      target.off('drain', done);
      target.off('close', done);
      resolve();
    };
    target.on('drain', done);
    target.on('close', done);
  });
}

/**
 * Write one subscription to `target` until the target closes or the hub
 * ends the subscription. Resolves when the stream is finished.
 */
export async function streamEvents(target: Writable, options: StreamEventsOptions): Promise<void> {
  const { hub, heartbeatMs = HEARTBEAT_INTERVAL_MS, logger = silentLogger, snapshot = false } = options;
  const subscription = hub.subscribe({ snapshot });

  const send = async (chunk: string) => {
    if (!isOpen(target)) {
      hub.unsubscribe(subscription);
      return;
    }
    if (!target.write(chunk)) {
      await drained(target);
    }
  };

  // A heartbeat is skipped while the socket is still behind
  const heartbeat = setInterval(() => {
    if (isOpen(target) && !target.writableNeedDrain) {
      target.write(': heartbeat\n\n');
    }
  }, heartbeatMs);

  const onClose = () => {
    hub.unsubscribe(subscription);
  };
  target.once('close', onClose);
  logger.info('Event stream opened', { id: subscription.id });

  try {
    await send(formatServerEvent('connected', { subscriber: subscription.id }));
    await hub.attach(subscription, (message) => send(formatHubMessage(message)));
  } finally {
    clearInterval(heartbeat);
    target.off('close', onClose);
    if (isOpen(target)) {
      target.end();
    }
    logger.info('Event stream closed', { id: subscription.id, dropped: subscription.dropped });
  }
}

/**
 * Express handler for `GET /events`. `?snapshot=1` sends every current
 * state first.
 */
export function createEventsHandler(options: EventStreamOptions): RequestHandler {
  const { logger = silentLogger } = options;

  return (req: Request, res: Response) => {
    res.status(200);
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache, no-transform');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    streamEvents(res, { ...options, snapshot: req.query.snapshot === '1' }).catch((error: unknown) => {
      logger.error('Event stream failed', describeError(error));
      res.destroy();
    });
  };
}
