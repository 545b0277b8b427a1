import {
  BadGatewayException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import { randomUUID } from 'crypto';
import type { JsonObject } from '../common/json';
import type { Result } from '../common/result';
import { PlatformGateway } from '../platform/platform-api';
import { describeFailure, PlatformFailure, WebPixel } from '../platform/platform.types';
import { TenantEntity } from '../tenants/entities/tenant.entity';
import { TenantRepository } from '../tenants/tenant.repository';
import { ExtensionEntity, ExtensionStatus } from './entities/extension.entity';
import { ExtensionRepository } from './extension.repository';

export interface ExtensionView {
  platformId: string | null;
  accountId: string;
  status: ExtensionStatus;
  version: string | null;
}

const toView = (extension: ExtensionEntity): ExtensionView => ({
  platformId: extension.platform_id,
  accountId: extension.account_id,
  status: extension.status,
  version: extension.version,
});

const nextVersion = (version: string | null) => String((parseInt(version ?? '0', 10) || 0) + 1);

/** The platform refuses a second pixel per app with a "taken"/"already exists" user error */
function isPixelTaken(failure: PlatformFailure): boolean {
  return (
    failure.kind === 'user_errors' &&
    failure.errors.some((e) => /taken|already exists/i.test(e.message))
  );
}

/**
 * Web pixel lifecycle. The account id written into the pixel settings is what
 * every storefront event carries; it stays stable across re-activation and updates.
 */
@Injectable()
export class ExtensionsService {
  private readonly logger = new Logger(ExtensionsService.name);

  constructor(
    private readonly tenants: TenantRepository,
    private readonly extensions: ExtensionRepository,
    private readonly gateway: PlatformGateway,
  ) {}

  async activate(shop: string, accessToken?: string, accountId?: string): Promise<ExtensionView> {
    const tenant = await this.requireTenant(shop);
    const existing = await this.extensions.findLatestForTenant(tenant.id);

    // Stored events reference the account id, so an existing extension keeps its own
    if (existing && accountId !== undefined && accountId !== existing.account_id) {
      throw new ConflictException(
        `Extension for ${shop} already uses account_id ${existing.account_id}; it cannot be changed`,
      );
    }
    const resolvedAccountId = existing?.account_id ?? accountId ?? randomUUID().replace(/-/g, '');
    await this.assertAccountIdFree(resolvedAccountId, tenant.id);

    const api = this.gateway.forTenant(shop, this.tokenFor(tenant, accessToken));
    const settings: JsonObject = { accountID: resolvedAccountId };

    let created = await api.createWebPixel(settings);
    if (!created.ok && isPixelTaken(created.error) && existing?.platform_id) {
      this.logger.log(`Pixel already exists for ${shop}; re-activating ${existing.platform_id}`);
      created = await api.updateWebPixel(existing.platform_id, settings);
    }
    const pixel = this.unwrap(created, `activate pixel for ${shop}`);

    let saved: ExtensionEntity;
    if (existing) {
      existing.platform_id = pixel.id;
      existing.status = 'active';
      existing.version = nextVersion(existing.version);
      saved = await this.extensions.save(existing);
    } else {
      saved = await this.extensions.create({
        tenant_id: tenant.id,
        platform_id: pixel.id,
        account_id: resolvedAccountId,
        status: 'active',
        version: '1',
      });
    }

    this.logger.log(`Extension ${saved.account_id} active for ${shop} (v${saved.version})`);
    return toView(saved);
  }

  async update(
    shop: string,
    platformId: string,
    settings: JsonObject = {},
    accessToken?: string,
  ): Promise<ExtensionView> {
    const tenant = await this.requireTenant(shop);
    const extension = await this.extensions.findByPlatformId(tenant.id, platformId);
    if (!extension) {
      throw new NotFoundException(`Extension ${platformId} not found for ${shop}`);
    }

    const api = this.gateway.forTenant(shop, this.tokenFor(tenant, accessToken));
    const updated = await api.updateWebPixel(platformId, {
      ...settings,
      accountID: extension.account_id,
    });
    this.unwrap(updated, `update pixel ${platformId} for ${shop}`);

    extension.status = 'active';
    extension.version = nextVersion(extension.version);
    return toView(await this.extensions.save(extension));
  }

  async status(shop: string): Promise<ExtensionView> {
    const tenant = await this.requireTenant(shop);
    const extension = await this.extensions.findLatestForTenant(tenant.id);
    if (!extension) {
      throw new NotFoundException(`No extension registered for ${shop}`);
    }
    return toView(extension);
  }

  private async requireTenant(shop: string): Promise<TenantEntity> {
    const tenant = await this.tenants.findByDomain(shop);
    if (!tenant) {
      throw new NotFoundException(`Shop ${shop} is not installed`);
    }
    return tenant;
  }

  /** Caller-supplied token wins; otherwise the one stored at install */
  private tokenFor(tenant: TenantEntity, accessToken?: string): string {
    const token = accessToken || tenant.access_token;
    if (!token) {
      throw new UnauthorizedException(`No access token for ${tenant.shop_domain}`);
    }
    return token;
  }

  private async assertAccountIdFree(accountId: string, tenantId: number): Promise<void> {
    const owner = await this.extensions.findByAccountId(accountId);
    if (owner && owner.tenant_id !== tenantId) {
      throw new ConflictException('account_id is already in use');
    }
  }

  private unwrap(
    result: Result<WebPixel, PlatformFailure>,
    action: string,
  ): WebPixel {
    if (result.ok) return result.value;

    const detail = describeFailure(result.error);
    this.logger.error(`Failed to ${action}: ${detail}`);
    throw new BadGatewayException(`Platform rejected the request: ${detail}`);
  }
}
