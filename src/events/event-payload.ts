import { SUBJECT_ID_PATHS } from '../common/constants';
import { isRecord, JsonObject } from '../common/json';
import { err, ok, Result } from '../common/result';

/**
 * Storefront events the collector sends. Each one carries the buyer under
 * `customer` (null for anonymous visitors) and the event detail under `data`.
 */
export const KNOWN_EVENT_NAMES = [
  'page_viewed',
  'product_viewed',
  'search_submitted',
  'cart_viewed',
  'collection_viewed',
  'product_added_to_cart',
  'checkout_completed',
] as const;
export type KnownEventName = (typeof KNOWN_EVENT_NAMES)[number];

interface Variant<N extends KnownEventName, D extends string> {
  eventName: N;
  customer: JsonObject | null;
  /** Event detail under its domain name; null when the collector sent none */
  detail: { [K in D]: JsonObject | null };
  raw: JsonObject;
}

export type EventPayload =
  | Variant<'page_viewed', 'page'>
  | Variant<'product_viewed', 'productVariant'>
  | Variant<'search_submitted', 'searchResult'>
  | Variant<'cart_viewed', 'cart'>
  | Variant<'collection_viewed', 'collection'>
  | Variant<'product_added_to_cart', 'cartLine'>
  | Variant<'checkout_completed', 'checkout'>
  | { eventName: 'unknown'; originalName: string; raw: JsonObject };

export function isKnownEventName(name: string): name is KnownEventName {
  return KNOWN_EVENT_NAMES.some((known) => known === name);
}

/** null for absent values, undefined for values of the wrong type */
function objectOrNull(value: unknown): JsonObject | null | undefined {
  if (value === undefined || value === null) return null;
  return isRecord(value) ? value : undefined;
}

/**
 * Reads a payload into its variant. Known events must keep `customer` and
 * `data` as objects when present; any other event name passes through opaque.
 */
export function classifyPayload(eventName: string, raw: JsonObject): Result<EventPayload, string> {
  if (!isKnownEventName(eventName)) {
    return ok({ eventName: 'unknown', originalName: eventName, raw });
  }

  const customer = objectOrNull(raw.customer);
  if (customer === undefined) return err(`${eventName}: customer must be an object or null`);

  const data = objectOrNull(raw.data);
  if (data === undefined) return err(`${eventName}: data must be an object`);

  switch (eventName) {
    case 'page_viewed':
      return ok({ eventName, customer, detail: { page: data }, raw });
    case 'product_viewed':
      return ok({ eventName, customer, detail: { productVariant: data }, raw });
    case 'search_submitted':
      return ok({ eventName, customer, detail: { searchResult: data }, raw });
    case 'cart_viewed':
      return ok({ eventName, customer, detail: { cart: data }, raw });
    case 'collection_viewed':
      return ok({ eventName, customer, detail: { collection: data }, raw });
    case 'product_added_to_cart':
      return ok({ eventName, customer, detail: { cartLine: data }, raw });
    case 'checkout_completed':
      return ok({ eventName, customer, detail: { checkout: data }, raw });
  }
}

/** Value at `path` inside `payload`, or undefined when any step is missing */
export function readPath(payload: unknown, path: readonly string[]): unknown {
  let current: unknown = payload;
  for (const segment of path) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

const CUSTOMER_GID = /^gid:\/\/shopify\/Customer\/(\d+)$/;

/**
 * Spellings of one customer identifier. Webhooks send the numeric id while the
 * storefront may report the global id; both name the same person.
 */
export function identifierForms(subjectId: string | number): string[] {
  const text = String(subjectId).trim();
  const numeric = /^\d+$/.test(text) ? text : CUSTOMER_GID.exec(text)?.[1];
  if (numeric === undefined) return [text];
  return [numeric, `gid://shopify/Customer/${numeric}`];
}

/** Whether the subject sits at any of `paths` in the payload */
export function payloadMentionsSubject(
  payload: unknown,
  subjectId: string | number,
  paths: readonly (readonly string[])[] = SUBJECT_ID_PATHS,
): boolean {
  const forms = new Set(identifierForms(subjectId));
  return paths.some((path) => {
    const value = readPath(payload, path);
    return (typeof value === 'string' || typeof value === 'number') && forms.has(String(value));
  });
}

function nest(path: readonly string[], leaf: unknown): JsonObject {
  let doc: unknown = leaf;
  for (let i = path.length - 1; i >= 0; i--) {
    doc = { [path[i]]: doc };
  }
  return isRecord(doc) ? doc : {};
}

/**
 * jsonb documents that a payload mentioning the subject contains (`@>`), one per
 * path and identifier spelling. Numeric ids are also matched as numbers.
 */
export function subjectContainmentDocs(
  subjectId: string | number,
  paths: readonly (readonly string[])[] = SUBJECT_ID_PATHS,
): JsonObject[] {
  const leaves: (string | number)[] = [];
  for (const form of identifierForms(subjectId)) {
    leaves.push(form);
    if (/^\d+$/.test(form) && Number.isSafeInteger(Number(form))) leaves.push(Number(form));
  }

  return paths.filter((path) => path.length > 0).flatMap((path) => leaves.map((leaf) => nest(path, leaf)));
}
