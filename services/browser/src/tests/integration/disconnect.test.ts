import { get } from 'node:http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { InMemoryObjectStoreAdapter, type StoreCallOptions } from '@keyspace/storage';
import { createServer, type Server } from '../../app/server';
import { resetConfigForTests } from '../../config';

describe('browse route cancellation', () => {
  let server: Server;
  let store: InMemoryObjectStoreAdapter;

  beforeEach(() => {
    process.env.METRICS_SNAPSHOT_PATH = '/nonexistent/keyspace/metrics.json';
    resetConfigForTests();
    store = new InMemoryObjectStoreAdapter({ name: 'cancel' });
    store.put('reports/q1.csv', { size: 10 });
    server = createServer({ store });
  });

  afterEach(async () => {
    await server.stop();
    delete process.env.METRICS_SNAPSHOT_PATH;
    resetConfigForTests();
  });

  it('hands the store a live signal for each request', async () => {
    const seen: Array<StoreCallOptions | undefined> = [];
    const list = store.listChildrenPage.bind(store);
    vi.spyOn(store, 'listChildrenPage').mockImplementation(async (query, options) => {
      seen.push(options);
      return list(query, options);
    });
    await server.app.ready();

    const res = await server.app.inject({ method: 'GET', url: '/reports/' });

    expect(res.statusCode).toBe(200);
    expect(seen).toHaveLength(1);
    expect(seen[0]?.signal).toBeInstanceOf(AbortSignal);
    expect(seen[0]?.signal?.aborted).toBe(false);
  });

  it('aborts the in-flight store call when the client disconnects', async () => {
    let entered: () => void = () => undefined;
    const probing = new Promise<void>((resolve) => {
      entered = resolve;
    });
    let settle: (aborted: boolean) => void = () => undefined;
    const outcome = new Promise<boolean>((resolve) => {
      settle = resolve;
    });

    vi.spyOn(store, 'probeObject').mockImplementation(async (_key, options) => {
      const signal = options?.signal;
      entered();
      if (!signal) {
        settle(false);
        return undefined;
      }
      await new Promise<void>((resume) => signal.addEventListener('abort', () => resume(), { once: true }));
      settle(true);
      return undefined;
    });

    const address = await server.app.listen({ host: '127.0.0.1', port: 0 });
    const request = get(`${address}/reports/q1.csv`);
    // the client side sees a reset; only the server side matters here
    request.on('error', () => undefined);
    const closed = new Promise<void>((resolve) => request.once('close', () => resolve()));

    await probing;
    request.destroy();

    await expect(outcome).resolves.toBe(true);
    await closed;
  });
});
