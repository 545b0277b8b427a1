import { Injectable, Logger, OnApplicationBootstrap, OnApplicationShutdown } from '@nestjs/common';
import { KeyValueCache } from '../cache/key-value.cache';
import { CACHE_PURGE_INTERVAL_MS } from '../common/constants';
import { TaskQueue } from '../jobs/task-queue';

/** Periodically deletes expired cache entries and finished queue rows */
@Injectable()
export class CacheJanitor implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(CacheJanitor.name);
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly cache: KeyValueCache,
    private readonly queue: TaskQueue,
  ) {}

  onApplicationBootstrap() {
    this.timer = setInterval(() => {
      this.purge().catch((err) =>
        this.logger.error(`Purge failed: ${err instanceof Error ? err.message : String(err)}`),
      );
    }, CACHE_PURGE_INTERVAL_MS);
  }

  onApplicationShutdown() {
    if (this.timer) clearInterval(this.timer);
  }

  async purge(): Promise<{ cacheEntries: number; tasks: number }> {
    const cacheEntries = await this.cache.purgeExpired();
    const tasks = await this.queue.purgeDone();
    if (cacheEntries > 0 || tasks > 0) {
      this.logger.log(`Purged expired cache entries: ${cacheEntries}, finished tasks: ${tasks}`);
    }
    return { cacheEntries, tasks };
  }
}
