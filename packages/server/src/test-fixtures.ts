// Shared test fixtures for server tests

import { VirtualCanBus } from '@rvlink/bus';
import { InMemoryHistoryRepository } from '@rvlink/repositories';
import { createGateway, silentLogger } from '@rvlink/runtime';
import type { Gateway } from '@rvlink/runtime';
import { createMockClock, createMockTables } from '@rvlink/runtime/test-fixtures';
import { createCallerFactory } from './trpc/index.js';
import { createContext } from './trpc/context.js';
import { appRouter } from './trpc/routers/index.js';

export type MockBridge = {
  gateway: Gateway;
  bus: VirtualCanBus;
  history: InMemoryHistoryRepository;
};

/**
 * A gateway with the mock tables, in-memory history and a virtual can0
 * attached.
 */
export function createMockBridge(options: { attach?: boolean } = {}): MockBridge {
  const { attach = true } = options;
  const history = new InMemoryHistoryRepository({ now: () => new Date('2024-01-01T01:00:00.000Z') });
  const gateway = createGateway({
    ...createMockTables(),
    history,
    transmit: { repeat: 1, repeatDelayMs: 0 },
    now: createMockClock('2024-01-01T00:10:00.000Z'),
  });

  const bus = new VirtualCanBus('can0');
  if (attach) {
    gateway.attachInterface(bus);
  }
  return { gateway, bus, history };
}

const createCaller = createCallerFactory(appRouter);

export function createMockCaller(gateway: Gateway) {
  return createCaller(createContext({ gateway, logger: silentLogger }));
}
