import {
  BadGatewayException,
  BadRequestException,
  ForbiddenException,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHmac } from 'crypto';
import { err } from '../common/result';
import { FakePlatformGateway } from '../testing/fake-platform';
import { InMemoryKeyValueCache } from '../testing/in-memory.cache';
import { inMemoryRepositories } from '../testing/in-memory.repositories';
import { WebhookRegistrationService } from '../webhooks/webhook-registration.service';
import { AuthService, stateKey } from './auth.service';

const SECRET = 'test-secret';

function signed(params: Record<string, string>): Record<string, string> {
  const message = Object.keys(params)
    .sort()
    .map((key) => `${key}=${params[key]}`)
    .join('&');
  return { ...params, hmac: createHmac('sha256', SECRET).update(message).digest('hex') };
}

describe('AuthService', () => {
  let cache: InMemoryKeyValueCache;
  let gateway: FakePlatformGateway;
  let repos: ReturnType<typeof inMemoryRepositories>;
  let service: AuthService;

  const begin = async (shop = 'demo.example.com') => {
    const url = await service.beginInstall(shop);
    return new URL(url).searchParams.get('state') ?? '';
  };

  beforeEach(() => {
    cache = new InMemoryKeyValueCache();
    gateway = new FakePlatformGateway();
    repos = inMemoryRepositories();
    const config = new ConfigService({
      platform: { apiSecret: SECRET, appUrl: 'https://app.example.test' },
    });
    service = new AuthService(
      cache,
      gateway,
      repos.tenants,
      new WebhookRegistrationService(gateway, config),
      config,
    );
  });

  it('stores a one-time state for the shop', async () => {
    const state = await begin();

    expect(state).toMatch(/^[0-9a-f]{32}$/);
    expect(await cache.get(stateKey(state))).toEqual({ shop: 'demo.example.com' });
  });

  it('installs the tenant and registers webhooks', async () => {
    const state = await begin();

    const result = await service.completeInstall(
      signed({ shop: 'demo.example.com', code: 'test-code', state, timestamp: '1700000000' }),
    );

    expect(result.shop).toBe('demo.example.com');
    expect(result.installed).toBe(true);
    expect(result.webhooks.map((w) => w.outcome)).toEqual([
      'registered',
      'registered',
      'registered',
      'registered',
    ]);
    const tenant = await repos.tenants.findByDomain('demo.example.com');
    expect(tenant?.access_token).toBe('test-token');
    expect(tenant?.scopes).toEqual(['read_customers', 'write_pixels']);
  });

  it('rejects a replayed callback', async () => {
    const state = await begin();
    const query = signed({ shop: 'demo.example.com', code: 'test-code', state });
    await service.completeInstall(query);

    await expect(service.completeInstall(query)).rejects.toBeInstanceOf(ForbiddenException);
  });

  it('rejects a state issued for another shop', async () => {
    const state = await begin('other.example.com');

    await expect(
      service.completeInstall(signed({ shop: 'demo.example.com', code: 'test-code', state })),
    ).rejects.toBeInstanceOf(ForbiddenException);
  });

  it('rejects a bad hmac before touching the state', async () => {
    const state = await begin();
    const query = { ...signed({ shop: 'demo.example.com', code: 'test-code', state }), code: 'other' };

    await expect(service.completeInstall(query)).rejects.toBeInstanceOf(UnauthorizedException);
    expect(await cache.get(stateKey(state))).toEqual({ shop: 'demo.example.com' });
  });

  it('requires the code', async () => {
    const state = await begin();

    await expect(
      service.completeInstall(signed({ shop: 'demo.example.com', state })),
    ).rejects.toBeInstanceOf(BadRequestException);
  });

  it('maps a failed token exchange to 502', async () => {
    gateway.grant = err({ kind: 'http', status: 400, retryAfterMs: null, message: 'invalid code' });
    const state = await begin();

    await expect(
      service.completeInstall(signed({ shop: 'demo.example.com', code: 'test-code', state })),
    ).rejects.toBeInstanceOf(BadGatewayException);
    expect(repos.store.tenants).toEqual([]);
  });
});
