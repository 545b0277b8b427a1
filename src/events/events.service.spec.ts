import { BadRequestException, UnprocessableEntityException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RateLimitedException } from '../common/exceptions/rate-limited.exception';
import { InMemoryKeyValueCache } from '../testing/in-memory.cache';
import { inMemoryRepositories } from '../testing/in-memory.repositories';
import { EventsService } from './events.service';
import { RateLimiterService } from './rate-limiter.service';

describe('EventsService', () => {
  let repos: ReturnType<typeof inMemoryRepositories>;
  let service: EventsService;

  const build = (rateLimit = 100) => {
    repos = inMemoryRepositories();
    const limiter = new RateLimiterService(
      new InMemoryKeyValueCache(),
      new ConfigService({ ingestion: { rateLimit, rateWindowSeconds: 60 } }),
    );
    service = new EventsService(repos.events, repos.extensions, limiter);
  };

  const seedExtension = async (status: 'active' | 'inactive' = 'active') => {
    const tenant = await repos.tenants.saveInstallation({
      shopDomain: 'demo.example.com',
      accessToken: 'test-token',
      scopes: null,
    });
    await repos.extensions.create({
      tenant_id: tenant.id,
      platform_id: 'gid://shopify/WebPixel/1',
      account_id: 'acct-1',
      status,
      version: '1',
    });
    return tenant;
  };

  beforeEach(() => build());

  it('stores the event under the tenant that owns the account id', async () => {
    const tenant = await seedExtension();

    const stored = await service.ingest({
      accountId: 'acct-1',
      eventName: 'page_viewed',
      payload: { customer: { id: 'gid://Customer/42' } },
    });

    expect(stored.tenant_id).toBe(tenant.id);
    expect(stored.account_id).toBe('acct-1');
    expect(stored.event_name).toBe('page_viewed');
    expect(repos.store.events).toHaveLength(1);
  });

  it('keeps unknown event names as opaque payloads', async () => {
    await seedExtension();

    const stored = await service.ingest({
      accountId: 'acct-1',
      eventName: 'wishlist_added',
      payload: { sku: 'A-1' },
    });

    expect(stored.payload).toEqual({ sku: 'A-1' });
  });

  it('rejects an account id with no extension and persists nothing', async () => {
    await expect(
      service.ingest({ accountId: 'acct-unknown', eventName: 'page_viewed', payload: {} }),
    ).rejects.toBeInstanceOf(UnprocessableEntityException);
    expect(repos.store.events).toEqual([]);
  });

  it('rejects events for an inactive extension', async () => {
    await seedExtension('inactive');

    await expect(
      service.ingest({ accountId: 'acct-1', eventName: 'page_viewed', payload: {} }),
    ).rejects.toBeInstanceOf(UnprocessableEntityException);
    expect(repos.store.events).toEqual([]);
  });

  it('rejects a known event with a malformed shape', async () => {
    await seedExtension();

    await expect(
      service.ingest({ accountId: 'acct-1', eventName: 'cart_viewed', payload: { data: [1] } }),
    ).rejects.toBeInstanceOf(BadRequestException);
    expect(repos.store.events).toEqual([]);
  });

  it('rate limits before looking up the account', async () => {
    build(2);
    const attempt = () =>
      service.ingest({ accountId: 'acct-unknown', eventName: 'page_viewed', payload: {} });

    await expect(attempt()).rejects.toBeInstanceOf(UnprocessableEntityException);
    await expect(attempt()).rejects.toBeInstanceOf(UnprocessableEntityException);
    await expect(attempt()).rejects.toBeInstanceOf(RateLimitedException);
  });
});
