// Tests for interface supervision and reconnection

import { describe, it, expect, vi } from 'vitest';
import { VirtualCanBus } from '@rvlink/bus';
import type { CanBus } from '@rvlink/bus';
import { IngestionPipeline } from './pipeline.js';
import { InterfaceSupervisor, backoffDelay } from './supervisor.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import { FanoutHub } from '../fanout/hub.js';
import { EntityStateStore } from '../state/entity-store.js';
import { createMockTables } from '../test-fixtures.js';

// --- Test Fixtures ---

function createMockSupervisor(open: (name: string) => Promise<CanBus>) {
  const { specification, devices } = createMockTables();
  const diagnostics = new Diagnostics({ devices });
  const store = new EntityStateStore({ devices });
  const hub = new FanoutHub({ snapshot: () => store.snapshot() });
  const pipeline = new IngestionPipeline({ interfaceName: 'can0', specification, devices, store, hub, diagnostics });
  const connected: CanBus[] = [];
  const supervisor = new InterfaceSupervisor({
    interfaceName: 'can0',
    open,
    pipeline,
    diagnostics,
    backoff: { initialDelayMs: 1, maxDelayMs: 4 },
    onConnect: (bus) => connected.push(bus),
  });
  return { supervisor, pipeline, diagnostics, connected };
}

/**
 * A factory handing out the given buses in order, and a promise per bus
 * that resolves when it is opened.
 */
function createMockFactory(buses: VirtualCanBus[]) {
  const waiters = buses.map(() => {
    let resolve: () => void = () => {};
    const opened = new Promise<void>((done) => {
      resolve = done;
    });
    return { opened, resolve };
  });
  let index = 0;

  const open = vi.fn(async (): Promise<CanBus> => {
    const current = index++;
    const bus = buses[current];
    if (!bus) {
      throw new Error('no more buses');
    }
    waiters[current].resolve();
    return bus;
  });

  return { open, opened: waiters.map((waiter) => waiter.opened) };
}

// --- Tests ---

describe('backoffDelay', () => {
  it('should grow exponentially up to the maximum', () => {
    expect(backoffDelay(0)).toBe(500);
    expect(backoffDelay(1)).toBe(1000);
    expect(backoffDelay(3)).toBe(4000);
    expect(backoffDelay(10)).toBe(30000);
  });
});

describe('InterfaceSupervisor', () => {
  it('should reopen the interface after a disconnect', async () => {
    const first = new VirtualCanBus('can0');
    const second = new VirtualCanBus('can0');
    const { open, opened } = createMockFactory([first, second]);
    const { supervisor, pipeline, diagnostics, connected } = createMockSupervisor(open);
    const controller = new AbortController();

    const running = supervisor.run(controller.signal);
    await opened[0];
    first.disconnect('link down');
    await opened[1];

    controller.abort();
    await running;

    expect(open).toHaveBeenCalledTimes(2);
    expect(connected).toEqual([first, second]);
    expect(first.closed).toBe(true);
    expect(diagnostics.counters()).toMatchObject({ disconnects: 1, reconnects: 1 });
    expect(pipeline.state).toBe('stopped');
  });

  it('should retry when the interface cannot be opened', async () => {
    const bus = new VirtualCanBus('can0');
    let attempts = 0;
    let resolveOpened: () => void = () => {};
    const opened = new Promise<void>((done) => {
      resolveOpened = done;
    });
    const open = async (): Promise<CanBus> => {
      attempts++;
      if (attempts < 3) {
        throw new Error('no such device');
      }
      resolveOpened();
      return bus;
    };
    const { supervisor, diagnostics } = createMockSupervisor(open);
    const controller = new AbortController();

    const running = supervisor.run(controller.signal);
    await opened;
    controller.abort();
    await running;

    expect(attempts).toBe(3);
    expect(diagnostics.counters().reconnects).toBe(0);
  });

  it('should stop waiting when aborted during backoff', async () => {
    const open = vi.fn(async (): Promise<CanBus> => {
      throw new Error('no such device');
    });
    const { supervisor } = createMockSupervisor(open);
    const controller = new AbortController();

    const running = supervisor.run(controller.signal);
    await vi.waitFor(() => expect(open).toHaveBeenCalled());
    controller.abort();

    await expect(running).resolves.toBeUndefined();
  });
});
