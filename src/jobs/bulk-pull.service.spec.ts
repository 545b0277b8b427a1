import { ConfigService } from '@nestjs/config';
import { RESOURCE_TYPES } from '../common/constants';
import { InMemoryTaskQueue } from '../testing/in-memory-task.queue';
import { InMemoryKeyValueCache } from '../testing/in-memory.cache';
import { BulkPullService, PullRequest } from './bulk-pull.service';
import { TaskStore } from './task-store.service';

describe('BulkPullService', () => {
  let store: TaskStore;
  let queue: InMemoryTaskQueue;
  let service: BulkPullService;

  const request: PullRequest = {
    shop: 'demo.example.com',
    accessToken: 'test-token',
    mode: 'paginated',
    batchSize: 50,
  };

  beforeEach(() => {
    store = new TaskStore(new InMemoryKeyValueCache(), new ConfigService({ jobs: { resultTtlSeconds: 3600 } }));
    queue = new InMemoryTaskQueue();
    service = new BulkPullService(store, queue);
  });

  describe('start', () => {
    it('returns at once with one pending child per resource type', async () => {
      const started = await service.start(request);

      expect(started.status).toBe('started');
      expect(started.shop).toBe('demo.example.com');
      expect(Object.keys(started.children)).toEqual(['customers', 'products', 'orders']);

      for (const resourceType of RESOURCE_TYPES) {
        const status = await store.getStatus(started.children[resourceType] ?? '');
        expect(status).toMatchObject({ kind: 'resource-pull', state: 'pending', resourceType });
      }
    });

    it('marks the parent completed with its children', async () => {
      const started = await service.start(request);

      expect(await store.getStatus(started.jobId)).toMatchObject({
        kind: 'bulk-pull',
        state: 'completed',
        tenant: 'demo.example.com',
        children: started.children,
      });
    });

    it('queues one task per child carrying the pull settings', async () => {
      const started = await service.start(request);

      expect(queue.rows.map((r) => [r.jobId, r.resourceType, r.mode, r.batchSize, r.status])).toEqual([
        [started.children.customers, 'customers', 'paginated', 50, 'queued'],
        [started.children.products, 'products', 'paginated', 50, 'queued'],
        [started.children.orders, 'orders', 'paginated', 50, 'queued'],
      ]);
    });
  });

  describe('startSingle', () => {
    it('queues a lone resource pull', async () => {
      const started = await service.startSingle('orders', { ...request, mode: 'bulk' });

      expect(await store.getStatus(started.jobId)).toMatchObject({ state: 'pending', resourceType: 'orders' });
      expect(queue.rows).toHaveLength(1);
      expect(queue.rows[0].mode).toBe('bulk');
    });
  });
});
