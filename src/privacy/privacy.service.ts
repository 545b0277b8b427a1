import { Injectable, Logger } from '@nestjs/common';
import type { JsonObject } from '../common/json';
import { EventEntity } from '../events/entities/event.entity';
import { payloadMentionsSubject, subjectContainmentDocs } from '../events/event-payload';
import { EventRepository } from '../events/event.repository';
import { TenantRepository } from '../tenants/tenant.repository';

export type SubjectId = string | number;

export interface SubjectEvent {
  id: number;
  eventName: string;
  payload: JsonObject;
  receivedAt: string;
}

export interface SubjectDataReport {
  tenantFound: boolean;
  subjectId: string;
  events: SubjectEvent[];
}

export interface SubjectRedaction {
  tenantFound: boolean;
  deleted: number;
}

export interface TenantRedaction {
  tenantFound: boolean;
  events: number;
  extensions: number;
}

/**
 * Privacy-compliance requests against stored storefront events. Every lookup is
 * scoped to the tenant first; a payload match alone never crosses tenants.
 */
@Injectable()
export class PrivacyService {
  private readonly logger = new Logger(PrivacyService.name);

  constructor(
    private readonly tenants: TenantRepository,
    private readonly events: EventRepository,
  ) {}

  /** Compiles the subject's events for delivery. Read-only. */
  async subjectDataRequest(shopDomain: string, subjectId: SubjectId): Promise<SubjectDataReport> {
    const tenant = await this.tenants.findByDomain(shopDomain);
    if (!tenant) {
      this.logger.warn(`Data request for unknown shop ${shopDomain}; nothing to compile`);
      return { tenantFound: false, subjectId: String(subjectId), events: [] };
    }

    const matches = await this.findSubjectEvents(tenant.id, subjectId);
    this.logger.log(`Compiled ${matches.length} event(s) for a data request from ${shopDomain}`);

    return {
      tenantFound: true,
      subjectId: String(subjectId),
      events: matches.map((event) => ({
        id: event.id,
        eventName: event.event_name,
        payload: event.payload,
        receivedAt: event.received_at.toISOString(),
      })),
    };
  }

  /**
   * Deletes every event of the tenant that mentions the subject. `orderIds`
   * are recorded only: events are matched by subject, not by order.
   */
  async subjectRedact(
    shopDomain: string,
    subjectId: SubjectId,
    orderIds: SubjectId[] = [],
  ): Promise<SubjectRedaction> {
    const tenant = await this.tenants.findByDomain(shopDomain);
    if (!tenant) {
      this.logger.warn(`Redaction for unknown shop ${shopDomain}; nothing to delete`);
      return { tenantFound: false, deleted: 0 };
    }

    if (orderIds.length > 0) {
      this.logger.log(`Redaction for ${shopDomain} lists ${orderIds.length} order(s): ${orderIds.join(', ')}`);
    }

    const matches = await this.findSubjectEvents(tenant.id, subjectId);
    const deleted = await this.events.deleteByIds(
      tenant.id,
      matches.map((event) => event.id),
    );

    this.logger.log(`Redacted ${deleted} event(s) for a customer of ${shopDomain}`);
    return { tenantFound: true, deleted };
  }

  /** Erases the tenant's events and extensions and clears its credential in one transaction */
  async tenantRedact(shopDomain: string): Promise<TenantRedaction> {
    const tenant = await this.tenants.findByDomain(shopDomain);
    if (!tenant) {
      this.logger.warn(`Shop redaction for unknown shop ${shopDomain}; nothing to erase`);
      return { tenantFound: false, events: 0, extensions: 0 };
    }

    const erased = await this.tenants.eraseTenantData(tenant.id);
    this.logger.log(
      `Shop ${shopDomain} redacted: ${erased.events} event(s), ${erased.extensions} extension(s)`,
    );
    return { tenantFound: true, ...erased };
  }

  /** SQL containment prefilter, then an exact check of every known path */
  private async findSubjectEvents(tenantId: number, subjectId: SubjectId): Promise<EventEntity[]> {
    const candidates = await this.events.findContaining(tenantId, subjectContainmentDocs(subjectId));
    return candidates.filter(
      (event) => event.tenant_id === tenantId && payloadMentionsSubject(event.payload, subjectId),
    );
  }
}
