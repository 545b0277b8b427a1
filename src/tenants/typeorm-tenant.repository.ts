import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { EventEntity } from '../events/entities/event.entity';
import { ExtensionEntity } from '../extensions/entities/extension.entity';
import { TenantEntity } from './entities/tenant.entity';
import { InstallationInput, TenantErasure, TenantRepository } from './tenant.repository';

@Injectable()
export class TypeOrmTenantRepository extends TenantRepository {
  constructor(
    @InjectRepository(TenantEntity)
    private readonly tenantRepo: Repository<TenantEntity>,
    private readonly dataSource: DataSource,
  ) {
    super();
  }

  findByDomain(shopDomain: string): Promise<TenantEntity | null> {
    return this.tenantRepo.findOne({ where: { shop_domain: shopDomain } });
  }

  async saveInstallation(input: InstallationInput): Promise<TenantEntity> {
    const existing = await this.findByDomain(input.shopDomain);
    const tenant = existing ?? this.tenantRepo.create({ shop_domain: input.shopDomain });

    tenant.access_token = input.accessToken;
    tenant.scopes = input.scopes;
    tenant.is_installed = true;

    return this.tenantRepo.save(tenant);
  }

  async markUninstalled(tenantId: number): Promise<void> {
    await this.tenantRepo.update({ id: tenantId }, { access_token: '', is_installed: false });
  }

  eraseTenantData(tenantId: number): Promise<TenantErasure> {
    return this.dataSource.transaction(async (manager) => {
      const events = await manager.delete(EventEntity, { tenant_id: tenantId });
      const extensions = await manager.delete(ExtensionEntity, { tenant_id: tenantId });
      await manager.update(
        TenantEntity,
        { id: tenantId },
        { access_token: '', is_installed: false },
      );

      return { events: events.affected ?? 0, extensions: extensions.affected ?? 0 };
    });
  }
}
