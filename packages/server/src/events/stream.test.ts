// Tests for the Server-Sent Events stream

import { Writable } from 'node:stream';
import { afterEach, describe, it, expect, vi } from 'vitest';
import type { EntityState, StateChangeEvent } from '@rvlink/protocol';
import { FanoutHub } from '@rvlink/runtime';
import { formatServerEvent, streamEvents } from './stream.js';

// --- Test Fixtures ---

function createMockState(revision: number): EntityState {
  return {
    entityId: 'porch_light',
    signals: { operating_status: { status: 'ok', raw: 200, value: 100, unit: '%' } },
    updatedAt: '2024-01-01T00:00:00.000Z',
    revision,
    lastFrame: null,
    command: null,
  };
}

function createMockEvent(revision: number): StateChangeEvent {
  const state = createMockState(revision);
  return { entityId: state.entityId, revision, state, cause: 'bus', timestamp: state.updatedAt };
}

/**
 * A socket that accepts every write at once. read() resolves with the next
 * chunk written.
 */
function createMockSocket() {
  const chunks: string[] = [];
  const waiters: Array<(chunk: string) => void> = [];

  const socket = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      const text = chunk.toString();
      const waiter = waiters.shift();
      if (waiter) {
        waiter(text);
      } else {
        chunks.push(text);
      }
      callback();
    },
  });

  const read = (): Promise<string> => {
    const chunk = chunks.shift();
    if (chunk !== undefined) {
      return Promise.resolve(chunk);
    }
    return new Promise((resolve) => waiters.push(resolve));
  };

  return { socket, read };
}

/**
 * A socket whose client never reads: the first write is accepted and never
 * completes, so the buffer stays full.
 */
function createStalledSocket() {
  const written: string[] = [];
  const socket = new Writable({
    highWaterMark: 1,
    write(chunk: Buffer) {
      written.push(chunk.toString());
    },
  });
  return { socket, written };
}

function openStream(hub: FanoutHub, options: { snapshot?: boolean; heartbeatMs?: number } = {}) {
  const { socket, read } = createMockSocket();
  const finished = streamEvents(socket, { hub, heartbeatMs: 60_000, ...options });
  return { socket, read, finished };
}

afterEach(() => {
  vi.useRealTimers();
});

// --- Tests ---

describe('formatServerEvent', () => {
  it('should write an event name and JSON data', () => {
    expect(formatServerEvent('drop', { dropped: 3 })).toBe('event: drop\ndata: {"dropped":3}\n\n');
  });
});

describe('streamEvents', () => {
  it('should send connected, the snapshot, then state events', async () => {
    const hub = new FanoutHub({ snapshot: () => [createMockState(1)] });
    const { read, socket, finished } = openStream(hub, { snapshot: true });

    expect(await read()).toBe('event: connected\ndata: {"subscriber":1}\n\n');
    expect(await read()).toBe(formatServerEvent('snapshot', [createMockState(1)]));

    hub.publish(createMockEvent(2));
    expect(await read()).toBe(formatServerEvent('state', createMockEvent(2)));

    socket.destroy();
    await finished;
  });

  it('should leave out the snapshot unless asked', async () => {
    const hub = new FanoutHub({ snapshot: () => [createMockState(1)] });
    const { read, socket, finished } = openStream(hub);

    await read();
    hub.publish(createMockEvent(2));
    expect(await read()).toBe(formatServerEvent('state', createMockEvent(2)));

    socket.destroy();
    await finished;
  });

  it('should tell a slow client how many events it lost', async () => {
    const hub = new FanoutHub({ snapshot: () => [], capacity: 1 });
    const { read, socket, finished } = openStream(hub);
    await read();

    hub.publish(createMockEvent(1));
    hub.publish(createMockEvent(2));
    hub.publish(createMockEvent(3));

    // The first event goes straight to the waiting writer; the second is
    // pushed out of the one-slot queue by the third
    expect(await read()).toBe(formatServerEvent('state', createMockEvent(1)));
    expect(await read()).toBe('event: drop\ndata: {"dropped":1}\n\n');
    expect(await read()).toBe(formatServerEvent('state', createMockEvent(3)));

    socket.destroy();
    await finished;
  });

  it('should drop the oldest events while the client is not reading', async () => {
    const hub = new FanoutHub({ snapshot: () => [], capacity: 2 });
    const { socket, written } = createStalledSocket();
    const finished = streamEvents(socket, { hub, heartbeatMs: 60_000 });

    for (let revision = 1; revision <= 10; revision++) {
      hub.publish(createMockEvent(revision));
    }

    expect(hub.stats().dropped).toBe(8);
    expect(written).toEqual(['event: connected\ndata: {"subscriber":1}\n\n']);

    socket.destroy();
    await finished;
    expect(hub.stats().subscribers).toBe(0);
  });

  it('should send heartbeats', async () => {
    vi.useFakeTimers();
    const hub = new FanoutHub({ snapshot: () => [] });
    const { read, socket } = openStream(hub, { heartbeatMs: 30_000 });
    await read();

    vi.advanceTimersByTime(30_000);
    expect(await read()).toBe(': heartbeat\n\n');

    socket.destroy();
  });

  it('should unsubscribe when the client disconnects', async () => {
    const hub = new FanoutHub({ snapshot: () => [] });
    const { read, socket, finished } = openStream(hub);
    await read();
    expect(hub.stats().subscribers).toBe(1);

    socket.destroy();
    await finished;

    expect(hub.stats().subscribers).toBe(0);
  });

  it('should end the response when the hub closes', async () => {
    const hub = new FanoutHub({ snapshot: () => [] });
    const { read, socket, finished } = openStream(hub);
    await read();

    hub.close();
    await finished;

    expect(socket.writableEnded).toBe(true);
  });
});
