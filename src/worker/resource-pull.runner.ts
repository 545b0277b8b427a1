import { Injectable, Logger } from '@nestjs/common';
import type { JobState } from '../jobs/job.types';
import type { ClaimedTask } from '../jobs/task-queue';
import { JobFields, TaskStore } from '../jobs/task-store.service';
import { PlatformGateway } from '../platform/platform-api';
import { describeFetchFailure, ResourceFetcher } from './resource-fetcher';

/** Executes one claimed child job: running → completed (with result) or failed (with detail) */
@Injectable()
export class ResourcePullRunner {
  private readonly logger = new Logger(ResourcePullRunner.name);

  constructor(
    private readonly store: TaskStore,
    private readonly gateway: PlatformGateway,
    private readonly fetcher: ResourceFetcher,
  ) {}

  async run(task: ClaimedTask): Promise<JobState> {
    const fields = this.fieldsOf(task);
    await this.store.setStatus(task.jobId, 'running', fields);

    const api = this.gateway.forTenant(task.shop, task.accessToken);
    const result = await this.fetcher.fetchAll(api, task.resourceType, task.mode, task.batchSize);

    if (!result.ok) {
      await this.markFailed(task, describeFetchFailure(result.error));
      return 'failed';
    }

    await this.store.setResult(task.shop, task.jobId, task.resourceType, result.value);
    await this.store.setStatus(task.jobId, 'completed', { ...fields, itemCount: result.value.length });

    this.logger.log(
      `${task.resourceType} pull ${task.jobId} for ${task.shop} completed with ${result.value.length} item(s)`,
    );
    return 'completed';
  }

  async markFailed(task: ClaimedTask, detail: string): Promise<void> {
    this.logger.error(`${task.resourceType} pull ${task.jobId} for ${task.shop} failed: ${detail}`);
    await this.store.setStatus(task.jobId, 'failed', { ...this.fieldsOf(task), error: detail });
  }

  private fieldsOf(task: ClaimedTask): JobFields {
    return { kind: 'resource-pull', tenant: task.shop, resourceType: task.resourceType };
  }
}
