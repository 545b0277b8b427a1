import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PrivacyService } from '../privacy/privacy.service';
import { inMemoryRepositories } from '../testing/in-memory.repositories';
import { signWebhookBody } from './signature';
import { WebhooksService } from './webhooks.service';

const SECRET = 'test-secret';

describe('WebhooksService', () => {
  let repos: ReturnType<typeof inMemoryRepositories>;
  let privacy: PrivacyService;
  let service: WebhooksService;

  const deliver = (topic: string, body: unknown, shopDomain?: string) => {
    const rawBody = Buffer.from(JSON.stringify(body));
    return service.dispatch({ topic, shopDomain, rawBody, signature: signWebhookBody(rawBody, SECRET) });
  };

  beforeEach(async () => {
    repos = inMemoryRepositories();
    privacy = new PrivacyService(repos.tenants, repos.events);
    service = new WebhooksService(
      new ConfigService({ platform: { apiSecret: SECRET } }),
      repos.tenants,
      privacy,
    );

    const tenant = await repos.tenants.saveInstallation({
      shopDomain: 'demo.example.com',
      accessToken: 'test-token',
      scopes: null,
    });
    await repos.extensions.create({
      tenant_id: tenant.id,
      platform_id: 'gid://shopify/WebPixel/1',
      account_id: 'acct-1',
      status: 'active',
      version: '1',
    });
    await repos.events.insert({
      tenant_id: tenant.id,
      account_id: 'acct-1',
      event_name: 'page_viewed',
      payload: { customer: { id: 'gid://shopify/Customer/42' } },
    });
  });

  it('rejects a delivery whose signature does not match', async () => {
    const rawBody = Buffer.from('{"shop_domain":"demo.example.com"}');

    const outcome = await service.dispatch({
      topic: 'shop/redact',
      rawBody,
      signature: signWebhookBody(rawBody, 'other-secret'),
    });

    expect(outcome).toBe('rejected');
    expect(repos.store.events).toHaveLength(1);
  });

  it('rejects a delivery without a signature header', async () => {
    expect(
      await service.dispatch({ topic: 'shop/redact', rawBody: Buffer.from('{}') }),
    ).toBe('rejected');
  });

  it('redacts the customer named in customers/redact', async () => {
    const outcome = await deliver('customers/redact', {
      shop_domain: 'demo.example.com',
      customer: { id: 42 },
      orders_to_redact: [1001, 1002],
    });

    expect(outcome).toBe('handled');
    expect(repos.store.events).toEqual([]);
  });

  it('compiles a data request without deleting anything', async () => {
    const spy = jest.spyOn(privacy, 'subjectDataRequest');

    const outcome = await deliver('customers/data_request', {
      shop_domain: 'demo.example.com',
      customer: { id: 42 },
    });

    expect(outcome).toBe('handled');
    expect(spy).toHaveBeenCalledWith('demo.example.com', 42);
    expect(repos.store.events).toHaveLength(1);
  });

  it('logs how many events a data request compiled', async () => {
    const log = jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);

    await deliver('customers/data_request', { shop_domain: 'demo.example.com', customer: { id: 42 } });

    expect(log).toHaveBeenCalledWith('customers/data_request from demo.example.com: 1 event(s) compiled');
    log.mockRestore();
  });

  it('erases the tenant on shop/redact', async () => {
    expect(await deliver('shop/redact', { shop_domain: 'demo.example.com' })).toBe('handled');
    expect(repos.store.events).toEqual([]);
    expect(repos.store.extensions).toEqual([]);
  });

  it('clears the credential on app/uninstalled and keeps the data', async () => {
    expect(await deliver('app/uninstalled', {}, 'Demo.Example.com')).toBe('handled');

    const tenant = await repos.tenants.findByDomain('demo.example.com');
    expect(tenant?.is_installed).toBe(false);
    expect(tenant?.access_token).toBe('');
    expect(repos.store.events).toHaveLength(1);
  });

  it('ignores deliveries for an unknown shop', async () => {
    expect(await deliver('shop/redact', { shop_domain: 'missing.example.com' })).toBe('ignored');
  });

  it('ignores topics it has no handler for', async () => {
    expect(await deliver('orders/create', { shop_domain: 'demo.example.com' })).toBe('ignored');
  });

  it('ignores a body that is not a JSON object', async () => {
    expect(await deliver('shop/redact', ['demo.example.com'], 'demo.example.com')).toBe('ignored');
  });

  it('acknowledges a customer redaction without a customer id', async () => {
    expect(await deliver('customers/redact', { shop_domain: 'demo.example.com' })).toBe('handled');
    expect(repos.store.events).toHaveLength(1);
  });

  it('reports a failing handler without throwing', async () => {
    jest.spyOn(privacy, 'tenantRedact').mockRejectedValue(new Error('connection reset'));

    expect(await deliver('shop/redact', { shop_domain: 'demo.example.com' })).toBe('failed');
  });
});
