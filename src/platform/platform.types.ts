import type { JsonObject } from '../common/json';

export interface UserError {
  field: string[] | null;
  message: string;
}

/** Why a platform call produced no value */
export type PlatformFailure =
  | { kind: 'http'; status: number; retryAfterMs: number | null; message: string }
  | { kind: 'network'; message: string }
  | { kind: 'graphql'; messages: string[] }
  | { kind: 'user_errors'; errors: UserError[] }
  | { kind: 'malformed'; message: string };

/** One cursor page of a connection, nodes in cursor order */
export interface Page {
  nodes: JsonObject[];
  endCursor: string | null;
  hasNextPage: boolean;
}

export type BulkOperationStatus =
  | 'CREATED'
  | 'RUNNING'
  | 'COMPLETED'
  | 'CANCELING'
  | 'CANCELED'
  | 'EXPIRED'
  | 'FAILED';

export interface BulkOperation {
  id: string;
  status: BulkOperationStatus;
  errorCode: string | null;
  objectCount: number;
  /** Signed JSONL download URL, present once COMPLETED (null when the export is empty) */
  url: string | null;
}

export interface WebhookSubscription {
  id: string;
  topic: string;
  callbackUrl: string | null;
}

export interface WebPixel {
  id: string;
  settings: JsonObject;
}

export interface AccessGrant {
  accessToken: string;
  scopes: string[];
}

export function describeFailure(failure: PlatformFailure): string {
  switch (failure.kind) {
    case 'http':
      return `HTTP ${failure.status}: ${failure.message}`;
    case 'network':
      return `network error: ${failure.message}`;
    case 'graphql':
      return `GraphQL errors: ${failure.messages.join('; ')}`;
    case 'user_errors':
      return `user errors: ${failure.errors.map((e) => e.message).join('; ')}`;
    case 'malformed':
      return `malformed response: ${failure.message}`;
  }
}

/** Throttling and server-side errors are worth another attempt; the rest are not */
export function isTransient(failure: PlatformFailure): boolean {
  if (failure.kind === 'network') return true;
  if (failure.kind === 'http') return failure.status === 429 || failure.status >= 500;
  if (failure.kind === 'graphql') return failure.messages.some((m) => /throttled/i.test(m));
  return false;
}
