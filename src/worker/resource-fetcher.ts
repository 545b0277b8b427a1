import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { PullMode, ResourceType } from '../common/constants';
import { isRecord, JsonObject, parseJson } from '../common/json';
import { err, ok, Result } from '../common/result';
import type { PlatformApi, PlatformResult } from '../platform/platform-api';
import {
  BulkOperation,
  BulkOperationStatus,
  describeFailure,
  isTransient,
  Page,
  PlatformFailure,
} from '../platform/platform.types';

export type FetchFailure =
  | PlatformFailure
  | { kind: 'bulk_operation'; operationId: string; status: BulkOperationStatus; errorCode: string | null }
  | { kind: 'bulk_timeout'; operationId: string; polls: number };

export function describeFetchFailure(failure: FetchFailure): string {
  switch (failure.kind) {
    case 'bulk_operation':
      return `bulk operation ${failure.operationId} ended ${failure.status}` +
        (failure.errorCode ? ` (${failure.errorCode})` : '');
    case 'bulk_timeout':
      return `bulk operation ${failure.operationId} still running after ${failure.polls} polls`;
    default:
      return describeFailure(failure);
  }
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const FAILED_BULK_STATUSES: readonly BulkOperationStatus[] = ['CANCELING', 'CANCELED', 'EXPIRED', 'FAILED'];

/** The platform runs one bulk query per shop; a second start is refused until the first ends */
const isBulkBusy = (failure: PlatformFailure) =>
  failure.kind === 'user_errors' && failure.errors.some((e) => /already in progress/i.test(e.message));

/**
 * Pulls every record of one resource type for one tenant.
 *
 * Paginated mode walks the connection cursor by cursor. Bulk mode starts a
 * bulk export, polls it to completion and reads the JSONL file. Either way the
 * records come back in cursor order.
 */
@Injectable()
export class ResourceFetcher {
  private readonly logger = new Logger(ResourceFetcher.name);

  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly bulkPollIntervalMs: number;
  private readonly bulkMaxPolls: number;

  constructor(config: ConfigService) {
    this.maxAttempts = config.get<number>('jobs.maxAttempts', 3);
    this.retryDelayMs = config.get<number>('jobs.retryDelayMs', 1000);
    this.bulkPollIntervalMs = config.get<number>('jobs.bulkPollIntervalMs', 2000);
    this.bulkMaxPolls = config.get<number>('jobs.bulkMaxPolls', 900);
  }

  fetchAll(
    api: PlatformApi,
    resource: ResourceType,
    mode: PullMode,
    batchSize: number,
  ): Promise<Result<JsonObject[], FetchFailure>> {
    return mode === 'bulk' ? this.fetchBulk(api, resource) : this.fetchPaginated(api, resource, batchSize);
  }

  private async fetchPaginated(
    api: PlatformApi,
    resource: ResourceType,
    batchSize: number,
  ): Promise<Result<JsonObject[], FetchFailure>> {
    const items: JsonObject[] = [];
    let cursor: string | null = null;

    for (let pageNumber = 1; ; pageNumber++) {
      const after: string | null = cursor;
      const page: Result<Page, PlatformFailure> = await this.withRetry(
        () => api.fetchPage(resource, batchSize, after),
        `${resource} page ${pageNumber}`,
      );
      if (!page.ok) return page;

      items.push(...page.value.nodes);
      cursor = page.value.endCursor;
      if (!page.value.hasNextPage || cursor === null) return ok(items);
    }
  }

  private async fetchBulk(api: PlatformApi, resource: ResourceType): Promise<Result<JsonObject[], FetchFailure>> {
    const started = await this.startBulk(api, resource);
    if (!started.ok) return started;

    const finished = await this.awaitBulkOperation(api, started.value);
    if (!finished.ok) return finished;

    const url = finished.value.url;
    if (url === null) return ok([]);

    const body = await this.withRetry(() => api.downloadBulkResult(url), `${resource} bulk download`);
    if (!body.ok) return body;

    return parseBulkLines(body.value);
  }

  /**
   * Starts the export, waiting `bulkPollIntervalMs` while another export of the
   * same shop is running (sibling children share the shop's single slot).
   */
  private async startBulk(api: PlatformApi, resource: ResourceType): PlatformResult<BulkOperation> {
    for (let waits = 0; ; waits++) {
      const started = await this.withRetry(() => api.startBulkQuery(resource), `${resource} bulk start`);
      if (started.ok || !isBulkBusy(started.error) || waits >= this.bulkMaxPolls) return started;

      if (waits === 0) this.logger.log(`${resource} bulk start waiting for the shop's running export`);
      await sleep(this.bulkPollIntervalMs);
    }
  }

  private async awaitBulkOperation(
    api: PlatformApi,
    operation: BulkOperation,
  ): Promise<Result<BulkOperation, FetchFailure>> {
    let current = operation;

    for (let polls = 0; ; polls++) {
      if (current.status === 'COMPLETED') return ok(current);

      if (FAILED_BULK_STATUSES.includes(current.status)) {
        return err({
          kind: 'bulk_operation',
          operationId: current.id,
          status: current.status,
          errorCode: current.errorCode,
        });
      }

      if (polls >= this.bulkMaxPolls) {
        return err({ kind: 'bulk_timeout', operationId: operation.id, polls });
      }

      await sleep(this.bulkPollIntervalMs);
      const next = await this.withRetry(() => api.currentBulkOperation(), 'bulk status');
      if (!next.ok) return next;

      if (next.value === null || next.value.id !== operation.id) {
        return err({ kind: 'malformed', message: `bulk operation ${operation.id} is no longer current` });
      }
      current = next.value;
    }
  }

  /**
   * Runs a platform call up to `maxAttempts` times. Transient failures wait
   * `retryDelayMs * attempt`, or the server's Retry-After when that is longer.
   */
  private async withRetry<T>(operation: () => PlatformResult<T>, label: string): PlatformResult<T> {
    let result = await operation();

    for (let attempt = 1; attempt < this.maxAttempts; attempt++) {
      if (result.ok || !isTransient(result.error)) return result;

      const retryAfter = result.error.kind === 'http' ? result.error.retryAfterMs ?? 0 : 0;
      const delay = Math.max(this.retryDelayMs * attempt, retryAfter);
      this.logger.warn(
        `${label} failed (attempt ${attempt}/${this.maxAttempts}), retrying in ${delay}ms: ` +
          describeFailure(result.error),
      );
      await sleep(delay);
      result = await operation();
    }

    return result;
  }
}

/** Keeps the top-level records of a bulk export; nested connection rows carry `__parentId` */
export function parseBulkLines(body: string): Result<JsonObject[], FetchFailure> {
  const items: JsonObject[] = [];
  const lines = body.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === '') continue;

    const record = parseJson(line);
    if (!isRecord(record)) {
      return err({ kind: 'malformed', message: `bulk export line ${i + 1} is not a JSON object` });
    }
    if (record.__parentId === undefined) items.push(record);
  }

  return ok(items);
}
