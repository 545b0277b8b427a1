import { ConfigService } from '@nestjs/config';
import { RateLimitedException } from '../common/exceptions/rate-limited.exception';
import { InMemoryKeyValueCache } from '../testing/in-memory.cache';
import { RateDecision, RateLimiterService } from './rate-limiter.service';

describe('RateLimiterService', () => {
  let now: number;
  let cache: InMemoryKeyValueCache;
  let limiter: RateLimiterService;

  afterEach(() => jest.restoreAllMocks());

  beforeEach(() => {
    // 10s into a 60s window
    now = 1_699_999_990_000;
    cache = new InMemoryKeyValueCache(() => now);
    limiter = new RateLimiterService(
      cache,
      new ConfigService({ ingestion: { rateLimit: 3, rateWindowSeconds: 60 } }),
    );
  });

  it('allows up to the limit within one window', async () => {
    const decisions: RateDecision[] = [];
    for (let i = 0; i < 4; i++) decisions.push(await limiter.consume('acct-1', now));

    expect(decisions.map((d) => d.allowed)).toEqual([true, true, true, false]);
    expect(decisions.map((d) => d.remaining)).toEqual([2, 1, 0, 0]);
  });

  it('reports the seconds left in the window', async () => {
    const decision = await limiter.consume('acct-1', now);
    expect(decision.retryAfterSeconds).toBe(50);
  });

  it('counts each caller separately', async () => {
    for (let i = 0; i < 3; i++) await limiter.consume('acct-1', now);
    expect((await limiter.consume('acct-2', now)).allowed).toBe(true);
  });

  it('starts a fresh count in the next window', async () => {
    for (let i = 0; i < 4; i++) await limiter.consume('acct-1', now);
    now += 60_000;
    expect((await limiter.consume('acct-1', now)).allowed).toBe(true);
  });

  it('keeps counters in the shared cache under a window key', async () => {
    await limiter.consume('acct-1', now);
    const window = Math.floor(Math.floor(now / 1000) / 60);
    expect(cache.keys()).toEqual([`ratelimit:acct-1:${window}`]);
  });

  it('throws RateLimitedException with Retry-After once over the limit', async () => {
    jest.spyOn(Date, 'now').mockReturnValue(now);

    for (let i = 0; i < 3; i++) await limiter.assertAllowed('acct-1');
    await expect(limiter.assertAllowed('acct-1')).rejects.toMatchObject({
      retryAfterSeconds: 50,
    });
    await expect(limiter.assertAllowed('acct-1')).rejects.toBeInstanceOf(RateLimitedException);
  });
});
