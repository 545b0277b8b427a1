import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { KeyValueCache } from '../cache/key-value.cache';
import { RateLimitedException } from '../common/exceptions/rate-limited.exception';

export interface RateDecision {
  allowed: boolean;
  remaining: number;
  /** Seconds until the current window closes */
  retryAfterSeconds: number;
}

/**
 * Fixed-window request counter per caller, kept in the shared cache so every
 * API instance counts against the same window.
 */
@Injectable()
export class RateLimiterService {
  private readonly logger = new Logger(RateLimiterService.name);
  private readonly limit: number;
  private readonly windowSeconds: number;

  constructor(
    private readonly cache: KeyValueCache,
    config: ConfigService,
  ) {
    this.limit = config.get<number>('ingestion.rateLimit', 100);
    this.windowSeconds = Math.max(1, config.get<number>('ingestion.rateWindowSeconds', 60));
  }

  async consume(callerId: string, nowMs: number = Date.now()): Promise<RateDecision> {
    const nowSeconds = Math.floor(nowMs / 1000);
    const window = Math.floor(nowSeconds / this.windowSeconds);
    const count = await this.cache.increment(`ratelimit:${callerId}:${window}`, this.windowSeconds);

    return {
      allowed: count <= this.limit,
      remaining: Math.max(0, this.limit - count),
      retryAfterSeconds: (window + 1) * this.windowSeconds - nowSeconds,
    };
  }

  /** Throws RateLimitedException once the caller is over its limit for the window */
  async assertAllowed(callerId: string): Promise<void> {
    const decision = await this.consume(callerId);
    if (!decision.allowed) {
      this.logger.warn(`Rate limit exceeded for ${callerId}`);
      throw new RateLimitedException(decision.retryAfterSeconds);
    }
  }
}
