/** Resource types a bulk pull fans out to, one child job each */
export const RESOURCE_TYPES = ['customers', 'products', 'orders'] as const;
export type ResourceType = (typeof RESOURCE_TYPES)[number];

/** How a child job talks to the platform: cursor pages, or one bulk operation export */
export const PULL_MODES = ['paginated', 'bulk'] as const;
export type PullMode = (typeof PULL_MODES)[number];

/** Page size used when the caller does not pick one */
export const DEFAULT_BATCH_SIZE = 100;

/** Platform GraphQL connections reject `first` above this */
export const MAX_BATCH_SIZE = 250;

/** Delay between `currentBulkOperation` polls while an export is running */
export const BULK_POLL_INTERVAL_MS = 2_000;

/** Give up on a bulk export after this many polls (~30 minutes at the default interval) */
export const BULK_MAX_POLLS = 900;

/** How often a worker refreshes the claim on each task it is running */
export const CLAIM_HEARTBEAT_INTERVAL_MS = 60_000;

/** A claimed pull task with no heartbeat for this long is handed out again */
export const STALE_CLAIM_SECONDS = 600;

/** Outbound platform request timeout */
export const PLATFORM_REQUEST_TIMEOUT_MS = 30_000;

/** How often the worker deletes expired cache rows and finished queue rows */
export const CACHE_PURGE_INTERVAL_MS = 60_000;

/** OAuth `state` lifetime between /connect and /callback */
export const OAUTH_STATE_TTL_SECONDS = 600;

/** Topics the app must be subscribed to before it is considered installed */
export const REQUIRED_WEBHOOK_TOPICS = [
  'CUSTOMERS_DATA_REQUEST',
  'CUSTOMERS_REDACT',
  'SHOP_REDACT',
  'APP_UNINSTALLED',
] as const;
export type RequiredWebhookTopic = (typeof REQUIRED_WEBHOOK_TOPICS)[number];

/** Path on this service the platform delivers webhooks to */
export const WEBHOOK_CALLBACK_PATH = '/webhooks';

/**
 * Places a customer identifier can sit inside a stored storefront event payload.
 * Payload shapes differ per event name, so every path is tried.
 */
export const SUBJECT_ID_PATHS: readonly (readonly string[])[] = [
  ['customer', 'id'],
  ['data', 'customer', 'id'],
  ['cart', 'buyerIdentity', 'customer', 'id'],
  ['data', 'buyerIdentity', 'customer', 'id'],
  ['checkout', 'order', 'customer', 'id'],
  ['data', 'order', 'customer', 'id'],
];

/** Event names accepted from the storefront collector: snake_case, bounded length */
export const EVENT_NAME_REGEX = /^[a-z][a-z0-9_]{0,63}$/;

/** Platform shop domains: host names only, no scheme or path */
export const SHOP_DOMAIN_REGEX = /^[a-z0-9][a-z0-9-]*(\.[a-z0-9-]+)+$/i;
