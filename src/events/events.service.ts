import { BadRequestException, Injectable, Logger, UnprocessableEntityException } from '@nestjs/common';
import type { JsonObject } from '../common/json';
import { ExtensionRepository } from '../extensions/extension.repository';
import { EventEntity } from './entities/event.entity';
import { classifyPayload } from './event-payload';
import { EventRepository } from './event.repository';
import { RateLimiterService } from './rate-limiter.service';

export interface IncomingEvent {
  accountId: string;
  eventName: string;
  payload: JsonObject;
}

@Injectable()
export class EventsService {
  private readonly logger = new Logger(EventsService.name);

  constructor(
    private readonly events: EventRepository,
    private readonly extensions: ExtensionRepository,
    private readonly rateLimiter: RateLimiterService,
  ) {}

  /**
   * Stores one storefront event under the tenant that owns the account id.
   * Rate limiting runs first, so unknown callers cannot test account ids for free.
   */
  async ingest(event: IncomingEvent): Promise<EventEntity> {
    await this.rateLimiter.assertAllowed(event.accountId);

    const classified = classifyPayload(event.eventName, event.payload);
    if (!classified.ok) {
      this.logger.warn(`Rejected event from ${event.accountId}: ${classified.error}`);
      throw new BadRequestException(classified.error);
    }
    if (classified.value.eventName === 'unknown') {
      this.logger.log(`Storing unrecognised event ${event.eventName} as opaque payload`);
    }

    const extension = await this.extensions.findByAccountId(event.accountId);
    if (!extension || extension.status !== 'active') {
      this.logger.warn(`Rejected event for unmapped account ${event.accountId}`);
      throw new UnprocessableEntityException('account_id does not belong to an active extension');
    }

    return this.events.insert({
      tenant_id: extension.tenant_id,
      account_id: extension.account_id,
      event_name: event.eventName,
      payload: event.payload,
    });
  }
}
