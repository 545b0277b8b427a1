import { createHmac, timingSafeEqual } from 'crypto';

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

/**
 * Checks the base64 HMAC-SHA256 header of a webhook against the exact bytes
 * received. The body must not have been parsed and re-serialized first.
 */
export function verifyWebhookSignature(
  rawBody: Buffer | undefined,
  claimedSignature: string | undefined,
  secret: string,
): boolean {
  if (!rawBody || !claimedSignature || !secret) return false;

  const expected = createHmac('sha256', secret).update(rawBody).digest('base64');
  return safeEqual(expected, claimedSignature.trim());
}

export type QueryParams = Record<string, string | string[] | undefined>;

/** Array params are signed as `key=["a", "b"]` */
function formatParam(value: string | string[]): string {
  return Array.isArray(value) ? `[${value.map((v) => `"${v}"`).join(', ')}]` : value;
}

/**
 * Checks the hex `hmac` of an OAuth redirect: every other param, sorted by
 * key and joined as `k=v&k=v`, signed with the app secret.
 */
export function verifyOAuthQuery(query: QueryParams, secret: string): boolean {
  const claimed = query.hmac;
  if (typeof claimed !== 'string' || !claimed || !secret) return false;

  const message = Object.keys(query)
    .filter((key) => key !== 'hmac' && key !== 'signature')
    .sort()
    .flatMap((key) => {
      const value = query[key];
      return value === undefined ? [] : [`${key}=${formatParam(value)}`];
    })
    .join('&');

  const expected = createHmac('sha256', secret).update(message).digest('hex');
  return safeEqual(expected, claimed.toLowerCase());
}

/** Signs a webhook body the way the platform does; used by senders and specs */
export function signWebhookBody(rawBody: Buffer | string, secret: string): string {
  return createHmac('sha256', secret).update(rawBody).digest('base64');
}
