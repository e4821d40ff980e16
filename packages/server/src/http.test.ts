// Tests for HTTP routing and the typed client

import { once } from 'node:events';
import type { Server } from 'node:http';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { createBridgeClient } from './client.js';
import { createApp } from './http.js';
import { createMockBridge } from './test-fixtures.js';
import type { MockBridge } from './test-fixtures.js';

type MockServer = MockBridge & { url: string; server: Server };

const running: MockServer[] = [];

/**
 * The app on an ephemeral loopback port.
 */
async function createMockServer(): Promise<MockServer> {
  const bridge = createMockBridge();
  const server = createApp({ gateway: bridge.gateway }).listen(0, '127.0.0.1');
  await once(server, 'listening');

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server has no TCP address');
  }
  const mock = { ...bridge, server, url: `http://127.0.0.1:${address.port}` };
  running.push(mock);
  return mock;
}

afterEach(async () => {
  for (const { server, gateway } of running.splice(0)) {
    await gateway.stop();
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
});

describe('createApp', () => {
  it('should answer health checks', async () => {
    const { url } = await createMockServer();

    const response = await fetch(`${url}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      status: 'ok',
      interfaces: [{ interface: 'can0', state: 'listening', bus: 'can0' }],
    });
  });

  it('should return 404 for unknown paths', async () => {
    const { url } = await createMockServer();

    const response = await fetch(`${url}/api/entities`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Not found' });
  });

  it('should serve tRPC with HTTP status codes', async () => {
    const { url } = await createMockServer();
    const input = encodeURIComponent(JSON.stringify({ json: { id: 'missing_light' } }));

    const response = await fetch(`${url}/trpc/entities.get?input=${input}`);

    expect(response.status).toBe(404);
  });

  it('should open the event stream and close it with the connection', async () => {
    const { url, gateway } = await createMockServer();
    const aborted = new AbortController();

    const response = await fetch(`${url}/events`, { signal: aborted.signal });
    expect(response.headers.get('content-type')).toBe('text/event-stream');
    if (!response.body) {
      throw new Error('event stream has no body');
    }
    const { value } = await response.body.getReader().read();
    expect(new TextDecoder().decode(value)).toBe('event: connected\ndata: {"subscriber":1}\n\n');
    expect(gateway.hub.stats().subscribers).toBe(1);

    aborted.abort();

    await vi.waitFor(() => {
      expect(gateway.hub.stats().subscribers).toBe(0);
    });
  });
});

describe('createBridgeClient', () => {
  async function createMockClient() {
    const mock = await createMockServer();
    const client = createBridgeClient({ url: `${mock.url}/trpc` });
    return { ...mock, client };
  }

  it('should query through the API', async () => {
    const { client } = await createMockClient();

    const ids = await client.entities.ids.query();
    expect(ids).toHaveLength(6);
    expect(ids[0]).toBe('bedroom_ceiling_light');
  });

  it('should send control requests', async () => {
    const { client, bus } = await createMockClient();

    const receipt = await client.entities.control.mutate({
      id: 'porch_light',
      request: { command: 'toggle' },
    });

    expect(receipt.frames).toEqual(['19FEDBF9#1BFF000500000000']);
    expect(bus.sent.map((frame) => frame.id)).toEqual([0x19fedbf9]);
  });

  it('should surface the runtime error code', async () => {
    const { client } = await createMockClient();

    await expect(client.entities.get.query({ id: 'missing_light' })).rejects.toMatchObject({
      message: 'Entity not found: missing_light',
      data: { code: 'NOT_FOUND', reason: 'ENTITY_NOT_FOUND', httpStatus: 404 },
    });
  });
});
