import { ConfigService } from '@nestjs/config';
import { REQUIRED_WEBHOOK_TOPICS } from '../common/constants';
import { FakePlatformGateway } from '../testing/fake-platform';
import { WebhookRegistrationService } from './webhook-registration.service';

describe('WebhookRegistrationService', () => {
  const CALLBACK = 'https://app.example.test/webhooks';
  let gateway: FakePlatformGateway;
  let service: WebhookRegistrationService;

  beforeEach(() => {
    gateway = new FakePlatformGateway();
    service = new WebhookRegistrationService(
      gateway,
      new ConfigService({ platform: { appUrl: 'https://app.example.test' } }),
    );
  });

  it('builds the callback url from the app url', () => {
    expect(service.callbackUrl()).toBe(CALLBACK);
  });

  it('registers every required topic on a fresh shop', async () => {
    const report = await service.reconcile('demo.example.com', 'test-token');

    expect(report).toEqual(REQUIRED_WEBHOOK_TOPICS.map((topic) => ({ topic, outcome: 'registered' })));
    expect(gateway.api.subscriptions.map((s) => s.topic)).toEqual([...REQUIRED_WEBHOOK_TOPICS]);
    expect(gateway.tokens).toEqual(['test-token']);
  });

  it('creates no duplicates when run twice', async () => {
    await service.reconcile('demo.example.com', 'test-token');
    const second = await service.reconcile('demo.example.com', 'test-token');

    expect(second.map((r) => r.outcome)).toEqual(['existing', 'existing', 'existing', 'existing']);
    expect(gateway.api.subscriptions).toHaveLength(4);
  });

  it('registers a topic that only points at another callback', async () => {
    gateway.api.subscriptions.push({
      id: 'gid://shopify/WebhookSubscription/99',
      topic: 'APP_UNINSTALLED',
      callbackUrl: 'https://old.example.test/webhooks',
    });

    const report = await service.reconcile('demo.example.com', 'test-token');

    expect(report.find((r) => r.topic === 'APP_UNINSTALLED')).toEqual({
      topic: 'APP_UNINSTALLED',
      outcome: 'registered',
    });
  });

  it('treats "already been taken" as registered when listing fails', async () => {
    await service.reconcile('demo.example.com', 'test-token');
    gateway.api.listFailure = { kind: 'http', status: 503, retryAfterMs: null, message: 'unavailable' };

    const report = await service.reconcile('demo.example.com', 'test-token');

    expect(report.map((r) => r.outcome)).toEqual([
      'already_taken',
      'already_taken',
      'already_taken',
      'already_taken',
    ]);
    expect(gateway.api.subscriptions).toHaveLength(4);
  });

  it('reports a topic that could not be registered and keeps going', async () => {
    gateway.api.createFailures.SHOP_REDACT = { kind: 'graphql', messages: ['Access denied'] };

    const report = await service.reconcile('demo.example.com', 'test-token');

    expect(report).toEqual([
      { topic: 'CUSTOMERS_DATA_REQUEST', outcome: 'registered' },
      { topic: 'CUSTOMERS_REDACT', outcome: 'registered' },
      { topic: 'SHOP_REDACT', outcome: 'failed', detail: 'GraphQL errors: Access denied' },
      { topic: 'APP_UNINSTALLED', outcome: 'registered' },
    ]);
  });

  it('uses an explicit callback url when given one', async () => {
    await service.reconcile('demo.example.com', 'test-token', 'https://tunnel.example.test/webhooks');

    expect(new Set(gateway.api.subscriptions.map((s) => s.callbackUrl))).toEqual(
      new Set(['https://tunnel.example.test/webhooks']),
    );
  });
});
