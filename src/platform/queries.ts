import type { ResourceType } from '../common/constants';

const RESOURCE_FIELDS: Record<ResourceType, string> = {
  customers: `
    id
    firstName
    lastName
    email
    createdAt
    tags
    note
    state
    amountSpent { amount currencyCode }`,
  products: `
    id
    title
    handle
    description
    productType
    vendor
    tags
    status
    createdAt
    priceRangeV2 {
      maxVariantPrice { amount }
      minVariantPrice { amount }
    }`,
  orders: `
    id
    name
    email
    createdAt
    displayFinancialStatus
    totalDiscountsSet { shopMoney { amount currencyCode } }
    totalPriceSet { shopMoney { amount currencyCode } }
    customer { id firstName lastName email }`,
};

export function pageQuery(resource: ResourceType): string {
  return `
    query FetchPage($first: Int!, $after: String) {
      ${resource}(first: $first, after: $after) {
        edges {
          cursor
          node {${RESOURCE_FIELDS[resource]}
          }
        }
        pageInfo { hasNextPage endCursor }
      }
    }`;
}

/** Bulk exports take the connection without pagination arguments */
export function bulkExportQuery(resource: ResourceType): string {
  return `
    {
      ${resource} {
        edges {
          node {${RESOURCE_FIELDS[resource]}
          }
        }
      }
    }`;
}

export const BULK_OPERATION_RUN_QUERY = `
  mutation BulkRun($query: String!) {
    bulkOperationRunQuery(query: $query) {
      bulkOperation { id status errorCode objectCount url }
      userErrors { field message }
    }
  }`;

export const CURRENT_BULK_OPERATION = `
  query CurrentBulkOperation {
    currentBulkOperation { id status errorCode objectCount url }
  }`;

export const WEBHOOK_SUBSCRIPTIONS = `
  query WebhookSubscriptions($first: Int!) {
    webhookSubscriptions(first: $first) {
      edges {
        node {
          id
          topic
          endpoint {
            __typename
            ... on WebhookHttpEndpoint { callbackUrl }
          }
        }
      }
    }
  }`;

export const WEBHOOK_SUBSCRIPTION_CREATE = `
  mutation WebhookCreate($topic: WebhookSubscriptionTopic!, $callbackUrl: URL!) {
    webhookSubscriptionCreate(
      topic: $topic
      webhookSubscription: { callbackUrl: $callbackUrl, format: JSON }
    ) {
      webhookSubscription {
        id
        topic
        endpoint {
          __typename
          ... on WebhookHttpEndpoint { callbackUrl }
        }
      }
      userErrors { field message }
    }
  }`;

export const WEB_PIXEL_CREATE = `
  mutation webPixelCreate($webPixel: WebPixelInput!) {
    webPixelCreate(webPixel: $webPixel) {
      userErrors { field message code }
      webPixel { id settings }
    }
  }`;

export const WEB_PIXEL_UPDATE = `
  mutation webPixelUpdate($id: ID!, $webPixel: WebPixelInput!) {
    webPixelUpdate(id: $id, webPixel: $webPixel) {
      userErrors { field message code }
      webPixel { id settings }
    }
  }`;
