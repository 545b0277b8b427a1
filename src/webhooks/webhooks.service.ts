import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { isRecord, JsonObject, parseJson, readString } from '../common/json';
import { PrivacyService, SubjectId } from '../privacy/privacy.service';
import { TenantEntity } from '../tenants/entities/tenant.entity';
import { TenantRepository } from '../tenants/tenant.repository';
import { verifyWebhookSignature } from './signature';

export interface WebhookDelivery {
  topic?: string;
  shopDomain?: string;
  signature?: string;
  rawBody?: Buffer;
}

/**
 * `rejected` is the only outcome the caller may surface as an error; everything
 * else is acknowledged so the platform does not redeliver.
 */
export type DispatchOutcome = 'rejected' | 'handled' | 'ignored' | 'failed';

type TopicHandler = (tenant: TenantEntity, body: JsonObject) => Promise<void>;

function readSubjectId(body: JsonObject): SubjectId | null {
  const customer = body.customer;
  const id = isRecord(customer) ? customer.id : undefined;
  return typeof id === 'string' || typeof id === 'number' ? id : null;
}

function readOrderIds(body: JsonObject): SubjectId[] {
  const orders = body.orders_to_redact ?? body.orders_requested;
  if (!Array.isArray(orders)) return [];
  return orders.filter((o): o is SubjectId => typeof o === 'string' || typeof o === 'number');
}

@Injectable()
export class WebhooksService {
  private readonly logger = new Logger(WebhooksService.name);
  private readonly handlers: Record<string, TopicHandler>;

  constructor(
    private readonly config: ConfigService,
    private readonly tenants: TenantRepository,
    private readonly privacy: PrivacyService,
  ) {
    this.handlers = {
      'customers/data_request': (tenant, body) => this.onDataRequest(tenant, body),
      'customers/redact': (tenant, body) => this.onCustomerRedact(tenant, body),
      'shop/redact': (tenant) => this.onShopRedact(tenant),
      'app/uninstalled': (tenant) => this.onUninstalled(tenant),
    };
  }

  async dispatch(delivery: WebhookDelivery): Promise<DispatchOutcome> {
    const secret = this.config.get<string>('platform.apiSecret', '');
    if (!verifyWebhookSignature(delivery.rawBody, delivery.signature, secret)) {
      this.logger.warn(`Rejected webhook ${delivery.topic ?? '(no topic)'}: bad signature`);
      return 'rejected';
    }

    const body = parseJson(delivery.rawBody?.toString('utf8') ?? '');
    if (!isRecord(body)) {
      this.logger.warn(`Webhook ${delivery.topic ?? '(no topic)'} has an undecodable body`);
      return 'ignored';
    }

    const shopDomain = (delivery.shopDomain ?? readString(body, 'shop_domain') ?? '').toLowerCase();
    const tenant = shopDomain ? await this.tenants.findByDomain(shopDomain) : null;
    if (!tenant) {
      this.logger.warn(`Webhook ${delivery.topic ?? '(no topic)'} for unknown shop ${shopDomain || '(none)'}`);
      return 'ignored';
    }

    const topic = delivery.topic ?? '';
    const handler = this.handlers[topic];
    if (!handler) {
      this.logger.warn(`Unhandled webhook topic ${topic || '(none)'} from ${shopDomain}`);
      return 'ignored';
    }

    try {
      await handler(tenant, body);
      return 'handled';
    } catch (error) {
      const detail = error instanceof Error ? error.stack ?? error.message : String(error);
      this.logger.error(`Webhook ${topic} for ${shopDomain} failed: ${detail}`);
      return 'failed';
    }
  }

  private async onDataRequest(tenant: TenantEntity, body: JsonObject): Promise<void> {
    const subjectId = readSubjectId(body);
    if (subjectId === null) {
      this.logger.warn(`customers/data_request from ${tenant.shop_domain} has no customer id`);
      return;
    }
    // Delivery to the merchant happens out of band; the report is compiled here
    const report = await this.privacy.subjectDataRequest(tenant.shop_domain, subjectId);
    this.logger.log(`customers/data_request from ${tenant.shop_domain}: ${report.events.length} event(s) compiled`);
  }

  private async onCustomerRedact(tenant: TenantEntity, body: JsonObject): Promise<void> {
    const subjectId = readSubjectId(body);
    if (subjectId === null) {
      this.logger.warn(`customers/redact from ${tenant.shop_domain} has no customer id`);
      return;
    }
    await this.privacy.subjectRedact(tenant.shop_domain, subjectId, readOrderIds(body));
  }

  private async onShopRedact(tenant: TenantEntity): Promise<void> {
    await this.privacy.tenantRedact(tenant.shop_domain);
  }

  private async onUninstalled(tenant: TenantEntity): Promise<void> {
    await this.tenants.markUninstalled(tenant.id);
    this.logger.log(`App uninstalled from ${tenant.shop_domain}`);
  }
}
