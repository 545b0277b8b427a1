import { InMemoryTaskQueue } from '../testing/in-memory-task.queue';
import { InMemoryKeyValueCache } from '../testing/in-memory.cache';
import { CacheJanitor } from './cache-janitor';

describe('CacheJanitor', () => {
  it('purges expired cache entries and finished tasks', async () => {
    let now = 0;
    const cache = new InMemoryKeyValueCache(() => now);
    const queue = new InMemoryTaskQueue();
    const janitor = new CacheJanitor(cache, queue);

    await cache.set('short', 1, 10);
    await cache.set('long', 2, 3600);
    await queue.enqueue({
      jobId: 'job-1',
      shop: 'demo.example.com',
      accessToken: 'test-token',
      resourceType: 'customers',
      mode: 'paginated',
      batchSize: 10,
    });
    await queue.enqueue({
      jobId: 'job-2',
      shop: 'demo.example.com',
      accessToken: 'test-token',
      resourceType: 'orders',
      mode: 'paginated',
      batchSize: 10,
    });
    await queue.complete(1);
    now = 11_000;

    expect(await janitor.purge()).toEqual({ cacheEntries: 1, tasks: 1 });
    expect(cache.keys()).toEqual(['long']);
    expect(queue.rows.map((r) => r.jobId)).toEqual(['job-2']);
  });
});
