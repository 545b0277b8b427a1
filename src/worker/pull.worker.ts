import { Injectable, Logger, OnApplicationBootstrap, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { hostname } from 'os';
import { CLAIM_HEARTBEAT_INTERVAL_MS } from '../common/constants';
import { ClaimedTask, TaskQueue } from '../jobs/task-queue';
import { ResourcePullRunner } from './resource-pull.runner';

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

/**
 * Claims queued pull tasks and runs up to `jobs.concurrency` of them at a time,
 * so the three children of one bulk pull proceed in parallel.
 */
@Injectable()
export class PullWorker implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(PullWorker.name);

  readonly workerId = `${hostname()}:${process.pid}:${randomUUID().slice(0, 8)}`;

  private readonly concurrency: number;
  private readonly pollIntervalMs: number;
  private readonly heartbeatIntervalMs: number;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private stopped = false;

  constructor(
    private readonly queue: TaskQueue,
    private readonly runner: ResourcePullRunner,
    config: ConfigService,
  ) {
    this.concurrency = Math.max(1, config.get<number>('jobs.concurrency', 3));
    this.pollIntervalMs = config.get<number>('jobs.pollIntervalMs', 1000);
    this.heartbeatIntervalMs = config.get<number>('jobs.heartbeatIntervalMs', CLAIM_HEARTBEAT_INTERVAL_MS);
  }

  onApplicationBootstrap() {
    this.logger.log(`Worker ${this.workerId} polling every ${this.pollIntervalMs}ms (concurrency ${this.concurrency})`);
    this.schedule(0);
  }

  async onApplicationShutdown() {
    this.stopped = true;
    if (this.timer) clearTimeout(this.timer);
    // Let the running batch finish so its tasks are not left claimed
    await this.inFlight;
    this.logger.log(`Worker ${this.workerId} stopped`);
  }

  /** Claims up to `concurrency` tasks and runs them together. Returns how many ran. */
  async runBatch(): Promise<number> {
    const claimed: ClaimedTask[] = [];
    while (claimed.length < this.concurrency) {
      const task = await this.queue.claim(this.workerId);
      if (!task) break;
      claimed.push(task);
    }

    await Promise.all(claimed.map((task) => this.execute(task)));
    return claimed.length;
  }

  /** Runs batches until the queue is empty. Returns the number of tasks run. */
  async drain(): Promise<number> {
    let total = 0;
    for (;;) {
      const ran = await this.runBatch();
      if (ran === 0) return total;
      total += ran;
    }
  }

  private async execute(task: ClaimedTask): Promise<void> {
    // Keeps the claim fresh while the pull runs, however many pages it takes
    const heartbeat = setInterval(() => {
      this.queue.heartbeat(task.taskId, this.workerId).catch((error) =>
        this.logger.warn(`Heartbeat for task ${task.taskId} failed: ${errorMessage(error)}`),
      );
    }, this.heartbeatIntervalMs);

    try {
      await this.runner.run(task);
    } catch (error) {
      await this.runner.markFailed(task, `unexpected error: ${errorMessage(error)}`);
    } finally {
      clearInterval(heartbeat);
      await this.queue.complete(task.taskId);
    }
  }

  private schedule(delayMs: number) {
    if (this.stopped) return;
    this.timer = setTimeout(() => {
      this.inFlight = this.tick();
    }, delayMs);
  }

  private async tick(): Promise<void> {
    let ran = 0;
    try {
      ran = await this.runBatch();
    } catch (error) {
      this.logger.error(`Worker batch failed: ${errorMessage(error)}`);
    }
    // Busy queue: go again at once
    this.schedule(ran > 0 ? 0 : this.pollIntervalMs);
  }
}
