import { DataSource } from 'typeorm';
import { InMemoryTaskQueue } from '../testing/in-memory-task.queue';
import { HealthController } from './health.controller';

describe('HealthController', () => {
  let dataSource: DataSource;
  let queue: InMemoryTaskQueue;
  let controller: HealthController;

  beforeEach(() => {
    // Never initialized: only `query` is exercised, and it is stubbed
    dataSource = new DataSource({ type: 'postgres' });
    queue = new InMemoryTaskQueue();
    controller = new HealthController(dataSource, queue);
  });

  it('reports the database up with queue depth', async () => {
    jest.spyOn(dataSource, 'query').mockResolvedValue([{ '?column?': 1 }]);
    await queue.enqueue({
      jobId: 'job-1',
      shop: 'demo.example.com',
      accessToken: 'test-token',
      resourceType: 'customers',
      mode: 'paginated',
      batchSize: 100,
    });

    expect(await controller.getHealth()).toEqual({
      status: 'ok',
      database: 'up',
      queue: { queued: 1, claimed: 0 },
    });
  });

  it('reports degraded when the database is unreachable', async () => {
    jest.spyOn(dataSource, 'query').mockRejectedValue(new Error('connect ECONNREFUSED'));

    expect(await controller.getHealth()).toEqual({ status: 'degraded', database: 'down', queue: null });
  });
});
