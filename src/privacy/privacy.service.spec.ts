import { ConfigService } from '@nestjs/config';
import { EventsService } from '../events/events.service';
import { RateLimiterService } from '../events/rate-limiter.service';
import { InMemoryKeyValueCache } from '../testing/in-memory.cache';
import { inMemoryRepositories } from '../testing/in-memory.repositories';
import { PrivacyService } from './privacy.service';

describe('PrivacyService', () => {
  let repos: ReturnType<typeof inMemoryRepositories>;
  let events: EventsService;
  let privacy: PrivacyService;

  const install = async (shopDomain: string, accountId: string) => {
    const tenant = await repos.tenants.saveInstallation({
      shopDomain,
      accessToken: 'test-token',
      scopes: ['read_customers'],
    });
    await repos.extensions.create({
      tenant_id: tenant.id,
      platform_id: `gid://shopify/WebPixel/${tenant.id}`,
      account_id: accountId,
      status: 'active',
      version: '1',
    });
    return tenant;
  };

  const track = (accountId: string, eventName: string, payload: Record<string, unknown>) =>
    events.ingest({ accountId, eventName, payload });

  beforeEach(async () => {
    repos = inMemoryRepositories();
    const limiter = new RateLimiterService(
      new InMemoryKeyValueCache(),
      new ConfigService({ ingestion: { rateLimit: 100, rateWindowSeconds: 60 } }),
    );
    events = new EventsService(repos.events, repos.extensions, limiter);
    privacy = new PrivacyService(repos.tenants, repos.events);

    await install('demo.example.com', 'acct-1');
    await install('other.example.com', 'acct-2');

    await track('acct-1', 'page_viewed', { customer: { id: 'gid://Customer/42' } });
    await track('acct-1', 'cart_viewed', {
      customer: null,
      data: { buyerIdentity: { customer: { id: 'gid://Customer/42' } } },
    });
    await track('acct-1', 'page_viewed', { customer: { id: 'gid://Customer/7' } });
    await track('acct-1', 'page_viewed', {});
    await track('acct-2', 'page_viewed', { customer: { id: 'gid://Customer/42' } });
  });

  describe('subjectDataRequest', () => {
    it('compiles every event of the tenant that mentions the subject', async () => {
      const report = await privacy.subjectDataRequest('demo.example.com', 'gid://Customer/42');

      expect(report.tenantFound).toBe(true);
      expect(report.subjectId).toBe('gid://Customer/42');
      expect(report.events.map((e) => e.eventName)).toEqual(['page_viewed', 'cart_viewed']);
      expect(report.events[0].payload).toEqual({ customer: { id: 'gid://Customer/42' } });
    });

    it('matches a numeric id against the global id stored by the storefront', async () => {
      await track('acct-1', 'product_viewed', { customer: { id: 'gid://shopify/Customer/99' } });

      const report = await privacy.subjectDataRequest('demo.example.com', 99);

      expect(report.events.map((e) => e.eventName)).toEqual(['product_viewed']);
    });

    it('does not read through to another tenant', async () => {
      const report = await privacy.subjectDataRequest('other.example.com', 'gid://Customer/42');
      expect(report.events).toHaveLength(1);
    });

    it('returns nothing for an unknown shop', async () => {
      expect(await privacy.subjectDataRequest('missing.example.com', 42)).toEqual({
        tenantFound: false,
        subjectId: '42',
        events: [],
      });
    });
  });

  describe('subjectRedact', () => {
    it('deletes the subject events so a later data request finds none', async () => {
      const redaction = await privacy.subjectRedact('demo.example.com', 'gid://Customer/42', [1001]);

      expect(redaction).toEqual({ tenantFound: true, deleted: 2 });
      const report = await privacy.subjectDataRequest('demo.example.com', 'gid://Customer/42');
      expect(report.events).toEqual([]);
    });

    it('leaves other subjects and other tenants untouched', async () => {
      await privacy.subjectRedact('demo.example.com', 'gid://Customer/42');

      expect(repos.store.events.map((e) => e.payload)).toEqual([
        { customer: { id: 'gid://Customer/7' } },
        {},
        { customer: { id: 'gid://Customer/42' } },
      ]);
    });

    it('is a no-op the second time', async () => {
      await privacy.subjectRedact('demo.example.com', 'gid://Customer/42');
      expect(await privacy.subjectRedact('demo.example.com', 'gid://Customer/42')).toEqual({
        tenantFound: true,
        deleted: 0,
      });
    });

    it('reports an unknown shop without deleting', async () => {
      expect(await privacy.subjectRedact('missing.example.com', 42)).toEqual({
        tenantFound: false,
        deleted: 0,
      });
      expect(repos.store.events).toHaveLength(5);
    });
  });

  describe('tenantRedact', () => {
    it('erases events and extensions and clears the credential', async () => {
      const redaction = await privacy.tenantRedact('demo.example.com');

      expect(redaction).toEqual({ tenantFound: true, events: 4, extensions: 1 });
      const tenant = await repos.tenants.findByDomain('demo.example.com');
      expect(tenant?.access_token).toBe('');
      expect(tenant?.is_installed).toBe(false);
      expect(repos.store.events.map((e) => e.account_id)).toEqual(['acct-2']);
      expect(repos.store.extensions.map((e) => e.account_id)).toEqual(['acct-2']);
    });

    it('is idempotent', async () => {
      await privacy.tenantRedact('demo.example.com');

      expect(await privacy.tenantRedact('demo.example.com')).toEqual({
        tenantFound: true,
        events: 0,
        extensions: 0,
      });
      expect(repos.store.tenants).toHaveLength(2);
    });

    it('reports an unknown shop', async () => {
      expect(await privacy.tenantRedact('missing.example.com')).toEqual({
        tenantFound: false,
        events: 0,
        extensions: 0,
      });
    });
  });
});
