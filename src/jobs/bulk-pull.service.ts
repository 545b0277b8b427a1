import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { PullMode, RESOURCE_TYPES, ResourceType } from '../common/constants';
import type { ChildJobs } from './job.types';
import { TaskQueue } from './task-queue';
import { TaskStore } from './task-store.service';

export interface PullRequest {
  shop: string;
  accessToken: string;
  mode: PullMode;
  batchSize: number;
}

export interface PullStarted {
  jobId: string;
  status: 'started';
  shop: string;
}

export interface BulkPullStarted extends PullStarted {
  children: ChildJobs;
}

/**
 * Starts pulls without waiting for them. Each resource type becomes its own
 * queued child job, run later by the worker process.
 */
@Injectable()
export class BulkPullService {
  private readonly logger = new Logger(BulkPullService.name);

  constructor(
    private readonly store: TaskStore,
    private readonly queue: TaskQueue,
  ) {}

  /** Fans out one child per resource type; the parent completes as soon as they are queued */
  async start(request: PullRequest): Promise<BulkPullStarted> {
    const jobId = randomUUID();
    const children: ChildJobs = {};

    for (const resourceType of RESOURCE_TYPES) {
      children[resourceType] = await this.enqueueChild(resourceType, request);
    }

    await this.store.setStatus(jobId, 'completed', {
      kind: 'bulk-pull',
      tenant: request.shop,
      children,
    });

    this.logger.log(`Bulk pull ${jobId} queued for ${request.shop} (${request.mode})`);
    return { jobId, status: 'started', shop: request.shop, children };
  }

  /** Queues a single resource pull with no parent */
  async startSingle(resourceType: ResourceType, request: PullRequest): Promise<PullStarted> {
    const jobId = await this.enqueueChild(resourceType, request);
    this.logger.log(`${resourceType} pull ${jobId} queued for ${request.shop}`);
    return { jobId, status: 'started', shop: request.shop };
  }

  private async enqueueChild(resourceType: ResourceType, request: PullRequest): Promise<string> {
    const jobId = randomUUID();

    // Status first: a worker that claims the task must find it
    await this.store.setStatus(jobId, 'pending', {
      kind: 'resource-pull',
      tenant: request.shop,
      resourceType,
    });
    await this.queue.enqueue({
      jobId,
      shop: request.shop,
      accessToken: request.accessToken,
      resourceType,
      mode: request.mode,
      batchSize: request.batchSize,
    });

    return jobId;
  }
}
