import { Logger } from '@nestjs/common';
import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { ResourceType } from '../common/constants';
import { isRecord, JsonObject, parseJson } from '../common/json';
import { err, ok, Result } from '../common/result';
import type { PlatformApi, PlatformResult } from './platform-api';
import type {
  BulkOperation,
  BulkOperationStatus,
  Page,
  PlatformFailure,
  UserError,
  WebhookSubscription,
  WebPixel,
} from './platform.types';
import {
  BULK_OPERATION_RUN_QUERY,
  bulkExportQuery,
  CURRENT_BULK_OPERATION,
  pageQuery,
  WEB_PIXEL_CREATE,
  WEB_PIXEL_UPDATE,
  WEBHOOK_SUBSCRIPTION_CREATE,
  WEBHOOK_SUBSCRIPTIONS,
} from './queries';

const BULK_STATUSES: readonly BulkOperationStatus[] = [
  'CREATED',
  'RUNNING',
  'COMPLETED',
  'CANCELING',
  'CANCELED',
  'EXPIRED',
  'FAILED',
];

/** The platform caps `first` on webhookSubscriptions at this */
const SUBSCRIPTIONS_PAGE_SIZE = 100;

type Parsed<T> = Result<T, PlatformFailure>;

const malformed = (message: string): Parsed<never> => err({ kind: 'malformed', message });

/**
 * Admin GraphQL client for one shop.
 *
 * Never throws: transport errors, HTTP errors, top-level GraphQL errors,
 * mutation user errors and unexpected shapes all come back as a PlatformFailure.
 */
export class ShopifyClient implements PlatformApi {
  private readonly logger = new Logger(ShopifyClient.name);

  constructor(
    private readonly shopDomain: string,
    /** Bound to the shop's versioned admin API, carries the access token */
    private readonly api: AxiosInstance,
    /** Unauthenticated, for signed bulk export URLs */
    private readonly files: AxiosInstance,
  ) {}

  fetchPage(resource: ResourceType, first: number, after: string | null): PlatformResult<Page> {
    return this.graphql(pageQuery(resource), { first, after }, (data) => parsePage(data[resource]));
  }

  startBulkQuery(resource: ResourceType): PlatformResult<BulkOperation> {
    return this.graphql(
      BULK_OPERATION_RUN_QUERY,
      { query: bulkExportQuery(resource) },
      (data) => {
        const payload = data.bulkOperationRunQuery;
        if (!isRecord(payload)) return malformed('bulkOperationRunQuery payload missing');

        const errors = parseUserErrors(payload.userErrors);
        if (errors.length > 0) return err({ kind: 'user_errors', errors });

        return parseBulkOperation(payload.bulkOperation);
      },
    );
  }

  currentBulkOperation(): PlatformResult<BulkOperation | null> {
    return this.graphql(CURRENT_BULK_OPERATION, {}, (data) => {
      const operation = data.currentBulkOperation;
      if (operation === null || operation === undefined) return ok(null);
      return parseBulkOperation(operation);
    });
  }

  async downloadBulkResult(url: string): PlatformResult<string> {
    try {
      const response = await this.files.get<unknown>(url, { responseType: 'text' });
      const body = response.data;
      if (typeof body !== 'string') return malformed('bulk export body is not text');
      return ok(body);
    } catch (error) {
      return err(toFailure(error));
    }
  }

  listWebhookSubscriptions(): PlatformResult<WebhookSubscription[]> {
    return this.graphql(WEBHOOK_SUBSCRIPTIONS, { first: SUBSCRIPTIONS_PAGE_SIZE }, (data) => {
      const connection = data.webhookSubscriptions;
      const edges = isRecord(connection) ? connection.edges : undefined;
      if (!Array.isArray(edges)) return malformed('webhookSubscriptions missing edges');

      const subscriptions: WebhookSubscription[] = [];
      for (const edge of edges) {
        const node = isRecord(edge) ? parseSubscription(edge.node) : null;
        if (!node) return malformed('webhook subscription edge without a valid node');
        subscriptions.push(node);
      }
      return ok(subscriptions);
    });
  }

  createWebhookSubscription(topic: string, callbackUrl: string): PlatformResult<WebhookSubscription> {
    return this.graphql(WEBHOOK_SUBSCRIPTION_CREATE, { topic, callbackUrl }, (data) => {
      const payload = data.webhookSubscriptionCreate;
      if (!isRecord(payload)) return malformed('webhookSubscriptionCreate payload missing');

      const errors = parseUserErrors(payload.userErrors);
      if (errors.length > 0) return err({ kind: 'user_errors', errors });

      const subscription = parseSubscription(payload.webhookSubscription);
      return subscription ? ok(subscription) : malformed('webhookSubscription missing');
    });
  }

  createWebPixel(settings: JsonObject): PlatformResult<WebPixel> {
    return this.graphql(
      WEB_PIXEL_CREATE,
      { webPixel: { settings: JSON.stringify(settings) } },
      (data) => parsePixelPayload(data.webPixelCreate),
    );
  }

  updateWebPixel(id: string, settings: JsonObject): PlatformResult<WebPixel> {
    return this.graphql(
      WEB_PIXEL_UPDATE,
      { id, webPixel: { settings: JSON.stringify(settings) } },
      (data) => parsePixelPayload(data.webPixelUpdate),
    );
  }

  private async graphql<T>(
    query: string,
    variables: JsonObject,
    pick: (data: JsonObject) => Parsed<T>,
  ): PlatformResult<T> {
    let body: unknown;
    try {
      const response = await this.api.post<unknown>('/graphql.json', { query, variables });
      body = response.data;
    } catch (error) {
      const failure = toFailure(error);
      this.logger.warn(`GraphQL request to ${this.shopDomain} failed: ${failure.kind}`);
      return err(failure);
    }

    if (!isRecord(body)) return malformed('response body is not an object');

    const errors = body.errors;
    if (Array.isArray(errors) && errors.length > 0) {
      const messages = errors.map((e) =>
        isRecord(e) && typeof e.message === 'string' ? e.message : JSON.stringify(e),
      );
      this.logger.warn(`GraphQL errors from ${this.shopDomain}: ${messages.join('; ')}`);
      return err({ kind: 'graphql', messages });
    }

    const data = body.data;
    if (!isRecord(data)) return malformed('response has no data');
    return pick(data);
  }
}

/** Maps anything axios throws onto the failure union */
export function toFailure(error: unknown): PlatformFailure {
  if (axios.isAxiosError(error)) {
    const response = error.response;
    if (response) {
      return {
        kind: 'http',
        status: response.status,
        retryAfterMs: parseRetryAfter(response.headers['retry-after']),
        message: error.message,
      };
    }
    return { kind: 'network', message: error.code ? `${error.code}: ${error.message}` : error.message };
  }
  return { kind: 'network', message: error instanceof Error ? error.message : String(error) };
}

/** Retry-After in seconds (the platform sends decimals such as "2.0") */
export function parseRetryAfter(value: unknown): number | null {
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? Math.round(seconds * 1000) : null;
}

export function parsePage(connection: unknown): Parsed<Page> {
  if (!isRecord(connection)) return malformed('connection missing');

  const edges = connection.edges;
  const pageInfo = connection.pageInfo;
  if (!Array.isArray(edges) || !isRecord(pageInfo)) {
    return malformed('connection missing edges or pageInfo');
  }

  const nodes: JsonObject[] = [];
  for (const edge of edges) {
    const node = isRecord(edge) ? edge.node : undefined;
    if (!isRecord(node)) return malformed('edge without node');
    nodes.push(node);
  }

  const endCursor = pageInfo.endCursor;
  return ok({
    nodes,
    hasNextPage: pageInfo.hasNextPage === true,
    endCursor: typeof endCursor === 'string' ? endCursor : null,
  });
}

function parseBulkOperation(value: unknown): Parsed<BulkOperation> {
  if (!isRecord(value)) return malformed('bulkOperation missing');

  const { id, status, errorCode, objectCount, url } = value;
  const knownStatus = BULK_STATUSES.find((s) => s === status);
  if (typeof id !== 'string' || !knownStatus) return malformed('bulkOperation without id or status');

  return ok({
    id,
    status: knownStatus,
    errorCode: typeof errorCode === 'string' ? errorCode : null,
    // UnsignedInt64 arrives as a string
    objectCount: Number(objectCount ?? 0) || 0,
    url: typeof url === 'string' ? url : null,
  });
}

function parseUserErrors(value: unknown): UserError[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord).map((e) => {
    const field = e.field;
    return {
      field: Array.isArray(field) ? field.map(String) : null,
      message: typeof e.message === 'string' ? e.message : 'unknown error',
    };
  });
}

function parseSubscription(value: unknown): WebhookSubscription | null {
  if (!isRecord(value)) return null;
  const { id, topic, endpoint } = value;
  if (typeof id !== 'string' || typeof topic !== 'string') return null;

  const callbackUrl = isRecord(endpoint) ? endpoint.callbackUrl : undefined;
  return { id, topic, callbackUrl: typeof callbackUrl === 'string' ? callbackUrl : null };
}

function parsePixelPayload(payload: unknown): Parsed<WebPixel> {
  if (!isRecord(payload)) return malformed('web pixel payload missing');

  const errors = parseUserErrors(payload.userErrors);
  if (errors.length > 0) return err({ kind: 'user_errors', errors });

  const pixel = payload.webPixel;
  if (!isRecord(pixel)) return malformed('webPixel missing');
  const id = pixel.id;
  if (typeof id !== 'string') return malformed('webPixel without id');

  // `settings` is a JSON scalar: serialized on some API versions, inline on others
  const raw = pixel.settings;
  const settings = typeof raw === 'string' ? parseJson(raw) : raw;
  return ok({ id, settings: isRecord(settings) ? settings : {} });
}
