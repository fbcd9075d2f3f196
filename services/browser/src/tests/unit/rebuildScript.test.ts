import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Writable } from 'node:stream';
import pino from 'pino';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { InMemoryObjectStoreAdapter, TransientAdapterError } from '@keyspace/storage';
import { readSnapshot, RebuildFailedError } from '@keyspace/vfs';
import { rebuild, runRebuildScript } from '../../../scripts/rebuildMetrics';
import { resetConfigForTests } from '../../config';

describe('rebuild script', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'keyspace-rebuild-'));
    process.env.METRICS_SNAPSHOT_PATH = join(dir, 'metrics.json');
    process.env.CRAWL_MAX_DEPTH = '1';
    resetConfigForTests();
  });

  afterEach(async () => {
    delete process.env.METRICS_SNAPSHOT_PATH;
    delete process.env.CRAWL_MAX_DEPTH;
    resetConfigForTests();
    await rm(dir, { recursive: true, force: true });
  });

  it('writes a snapshot bounded by the configured depth', async () => {
    const store = new InMemoryObjectStoreAdapter({ name: 'script' });
    store.put('a/b/c.txt', { size: 3 });
    store.put('d/e.txt', { size: 4 });

    const outcome = await rebuild(store);

    expect(outcome.status).toBe('completed');
    const persisted = await readSnapshot(join(dir, 'metrics.json'));
    expect(persisted.status === 'loaded' && persisted.snapshot.prefixes()).toEqual(['a/', 'd/']);
    expect(persisted.status === 'loaded' && persisted.snapshot.maxDepth).toBe(1);
  });

  it('fails when the namespace root cannot be listed', async () => {
    const store = new InMemoryObjectStoreAdapter({ name: 'script' });
    vi.spyOn(store, 'listChildrenPage').mockRejectedValue(new TransientAdapterError('unreachable'));

    await expect(rebuild(store)).rejects.toBeInstanceOf(RebuildFailedError);
    await expect(readSnapshot(join(dir, 'metrics.json'))).resolves.toEqual({ status: 'missing' });
  });

  it('logs a failed run and reports exit code 1', async () => {
    const lines: Array<Record<string, unknown>> = [];
    const logger = pino(
      { level: 'info' },
      new Writable({
        write(chunk, _encoding, callback) {
          lines.push(JSON.parse(chunk.toString()));
          callback();
        }
      })
    );
    const store = new InMemoryObjectStoreAdapter({ name: 'script' });
    vi.spyOn(store, 'listChildrenPage').mockRejectedValue(new TransientAdapterError('unreachable'));

    await expect(runRebuildScript(store, logger)).resolves.toBe(1);
    await new Promise((resolve) => setImmediate(resolve));

    expect(lines.find((line) => line.msg === 'metrics_rebuild_failed')).toMatchObject({
      level: 50,
      err: { type: 'RebuildFailedError', message: 'Unable to list the namespace root' }
    });
  });

  it('reports exit code 0 for a completed run', async () => {
    const store = new InMemoryObjectStoreAdapter({ name: 'script' });
    store.put('a/b.txt', { size: 2 });

    await expect(runRebuildScript(store, pino({ enabled: false }))).resolves.toBe(0);
  });
});
