import type { JsonObject } from '../common/json';
import { EventEntity } from './entities/event.entity';

export interface EventDraft {
  tenant_id: number;
  account_id: string;
  event_name: string;
  payload: JsonObject;
}

export abstract class EventRepository {
  abstract insert(draft: EventDraft): Promise<EventEntity>;

  /**
   * Events of one tenant whose payload contains at least one of `candidates`
   * (jsonb containment). The match is a prefilter: callers re-check every row.
   */
  abstract findContaining(tenantId: number, candidates: JsonObject[]): Promise<EventEntity[]>;

  /** Deletes the given events, scoped to the tenant. Returns the number removed. */
  abstract deleteByIds(tenantId: number, ids: number[]): Promise<number>;
}
