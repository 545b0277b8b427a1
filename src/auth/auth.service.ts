import {
  BadGatewayException,
  BadRequestException,
  ForbiddenException,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomBytes } from 'crypto';
import { KeyValueCache } from '../cache/key-value.cache';
import { OAUTH_STATE_TTL_SECONDS, SHOP_DOMAIN_REGEX } from '../common/constants';
import { isRecord } from '../common/json';
import { PlatformGateway } from '../platform/platform-api';
import { describeFailure } from '../platform/platform.types';
import { TenantRepository } from '../tenants/tenant.repository';
import { QueryParams, verifyOAuthQuery } from '../webhooks/signature';
import { TopicRegistration, WebhookRegistrationService } from '../webhooks/webhook-registration.service';

export interface InstallResult {
  shop: string;
  installed: true;
  webhooks: TopicRegistration[];
}

export const stateKey = (state: string) => `oauth:state:${state}`;

const single = (value: string | string[] | undefined) => (typeof value === 'string' ? value : undefined);

/** OAuth install: authorize redirect, then code exchange, tenant upsert and webhook setup */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly cache: KeyValueCache,
    private readonly gateway: PlatformGateway,
    private readonly tenants: TenantRepository,
    private readonly registration: WebhookRegistrationService,
    private readonly config: ConfigService,
  ) {}

  /** Stores a one-time `state` for the shop and returns the platform's authorize URL */
  async beginInstall(shop: string): Promise<string> {
    const state = randomBytes(16).toString('hex');
    await this.cache.set(stateKey(state), { shop }, OAUTH_STATE_TTL_SECONDS);
    this.logger.log(`Install started for ${shop}`);
    return this.gateway.authorizeUrl(shop, state);
  }

  async completeInstall(query: QueryParams): Promise<InstallResult> {
    if (!verifyOAuthQuery(query, this.config.get<string>('platform.apiSecret', ''))) {
      this.logger.warn('OAuth callback with an invalid hmac');
      throw new UnauthorizedException('Invalid OAuth signature');
    }

    const shop = single(query.shop)?.toLowerCase();
    const code = single(query.code);
    const state = single(query.state);
    if (!shop || !SHOP_DOMAIN_REGEX.test(shop) || !code || !state) {
      throw new BadRequestException('shop, code and state are required');
    }

    // One use only: a replayed callback finds no state
    const stored = await this.cache.take(stateKey(state));
    if (!isRecord(stored) || stored.shop !== shop) {
      this.logger.warn(`OAuth callback for ${shop} with unknown or mismatched state`);
      throw new ForbiddenException('Unknown or expired OAuth state');
    }

    const grant = await this.gateway.exchangeCode(shop, code);
    if (!grant.ok) {
      const detail = describeFailure(grant.error);
      this.logger.error(`Token exchange for ${shop} failed: ${detail}`);
      throw new BadGatewayException('Token exchange with the platform failed');
    }

    await this.tenants.saveInstallation({
      shopDomain: shop,
      accessToken: grant.value.accessToken,
      scopes: grant.value.scopes,
    });
    this.logger.log(`Installed on ${shop}`);

    // Missing webhooks are reported, never a reason to fail the install
    const webhooks = await this.registration.reconcile(shop, grant.value.accessToken);
    return { shop, installed: true, webhooks };
  }
}
