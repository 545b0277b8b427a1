import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { KeyValueCache } from '../cache/key-value.cache';
import type { ResourceType } from '../common/constants';
import { isJobStatus, JobKind, JobState, JobStatus, ResultLookup } from './job.types';

/** Identity and detail written alongside a state change */
export interface JobFields {
  kind: JobKind;
  tenant: string;
  resourceType?: ResourceType;
  children?: JobStatus['children'];
  itemCount?: number;
  error?: string;
}

export const statusKey = (jobId: string) => `job:status:${jobId}`;

export const resultKey = (tenant: string, resourceType: ResourceType, jobId: string) =>
  `job:result:${tenant}:${resourceType}:${jobId}`;

/**
 * Job status and results in the shared cache. Both expire after
 * RESULT_TTL_SECONDS; nothing deletes them explicitly.
 */
@Injectable()
export class TaskStore {
  private readonly logger = new Logger(TaskStore.name);
  private readonly ttlSeconds: number;

  constructor(
    private readonly cache: KeyValueCache,
    config: ConfigService,
  ) {
    this.ttlSeconds = config.get<number>('jobs.resultTtlSeconds', 3600);
  }

  async setStatus(jobId: string, state: JobState, fields: JobFields): Promise<JobStatus> {
    const existing = await this.getStatus(jobId);
    const now = new Date().toISOString();

    const status: JobStatus = {
      ...existing,
      ...fields,
      jobId,
      state,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };

    await this.cache.set(statusKey(jobId), status, this.ttlSeconds);
    return status;
  }

  async getStatus(jobId: string): Promise<JobStatus | null> {
    const value = await this.cache.get(statusKey(jobId));
    if (value === undefined) return null;

    if (!isJobStatus(value)) {
      this.logger.warn(`Discarding unreadable status for job ${jobId}`);
      return null;
    }
    return value;
  }

  async setResult(
    tenant: string,
    jobId: string,
    resourceType: ResourceType,
    payload: unknown[],
  ): Promise<void> {
    await this.cache.set(resultKey(tenant, resourceType, jobId), payload, this.ttlSeconds);
  }

  async getResult(
    tenant: string,
    jobId: string,
    resourceType: ResourceType,
  ): Promise<unknown[] | null> {
    const value = await this.cache.get(resultKey(tenant, resourceType, jobId));
    return Array.isArray(value) ? value : null;
  }

  /**
   * Resolves what a poller should see for (tenant, job, resource type).
   * A bulk-pull job id resolves through its child for that resource type.
   */
  async resolveResult(
    tenant: string,
    jobId: string,
    resourceType: ResourceType,
  ): Promise<ResultLookup> {
    const status = await this.getStatus(jobId);
    const childId = status?.kind === 'bulk-pull' ? status.children?.[resourceType] : undefined;

    if (status?.kind === 'bulk-pull') {
      if (status.tenant !== tenant || !childId) {
        return { status: 'missing', reason: `no ${resourceType} pull under job ${jobId} for ${tenant}` };
      }
      return this.resolveResult(tenant, childId, resourceType);
    }

    const data = await this.getResult(tenant, jobId, resourceType);
    if (data) return { status: 'ready', jobId, data };

    if (!status || status.tenant !== tenant || status.resourceType !== resourceType) {
      return { status: 'missing', reason: 'Results not found or expired' };
    }

    switch (status.state) {
      case 'pending':
      case 'running':
        return { status: 'pending', jobId, state: status.state };
      case 'failed':
        return { status: 'failed', jobId, error: status.error ?? 'pull failed' };
      case 'completed':
        return { status: 'missing', reason: 'Results expired' };
    }
  }
}
