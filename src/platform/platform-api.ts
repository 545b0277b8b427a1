import type { ResourceType } from '../common/constants';
import type { JsonObject } from '../common/json';
import type { Result } from '../common/result';
import type {
  AccessGrant,
  BulkOperation,
  Page,
  PlatformFailure,
  WebhookSubscription,
  WebPixel,
} from './platform.types';

export type PlatformResult<T> = Promise<Result<T, PlatformFailure>>;

/** Admin API calls for one tenant, authenticated with its access token */
export interface PlatformApi {
  fetchPage(resource: ResourceType, first: number, after: string | null): PlatformResult<Page>;

  startBulkQuery(resource: ResourceType): PlatformResult<BulkOperation>;

  /** The shop's most recent bulk operation, or null when it never ran one */
  currentBulkOperation(): PlatformResult<BulkOperation | null>;

  /** Raw JSONL body of a finished bulk export */
  downloadBulkResult(url: string): PlatformResult<string>;

  listWebhookSubscriptions(): PlatformResult<WebhookSubscription[]>;

  createWebhookSubscription(topic: string, callbackUrl: string): PlatformResult<WebhookSubscription>;

  createWebPixel(settings: JsonObject): PlatformResult<WebPixel>;

  updateWebPixel(id: string, settings: JsonObject): PlatformResult<WebPixel>;
}

/** Entry point to the platform. Nest resolves it to the Shopify implementation. */
export abstract class PlatformGateway {
  abstract forTenant(shopDomain: string, accessToken: string): PlatformApi;

  abstract authorizeUrl(shopDomain: string, state: string): string;

  /** Trades the OAuth callback code for an offline access token */
  abstract exchangeCode(shopDomain: string, code: string): PlatformResult<AccessGrant>;
}
