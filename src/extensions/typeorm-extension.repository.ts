import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ExtensionEntity } from './entities/extension.entity';
import { ExtensionDraft, ExtensionRepository } from './extension.repository';

@Injectable()
export class TypeOrmExtensionRepository extends ExtensionRepository {
  constructor(
    @InjectRepository(ExtensionEntity)
    private readonly extensionRepo: Repository<ExtensionEntity>,
  ) {
    super();
  }

  findByAccountId(accountId: string): Promise<ExtensionEntity | null> {
    return this.extensionRepo.findOne({ where: { account_id: accountId } });
  }

  findByPlatformId(tenantId: number, platformId: string): Promise<ExtensionEntity | null> {
    return this.extensionRepo.findOne({
      where: { tenant_id: tenantId, platform_id: platformId },
    });
  }

  findLatestForTenant(tenantId: number): Promise<ExtensionEntity | null> {
    return this.extensionRepo.findOne({
      where: { tenant_id: tenantId },
      order: { updated_at: 'DESC', id: 'DESC' },
    });
  }

  create(draft: ExtensionDraft): Promise<ExtensionEntity> {
    return this.extensionRepo.save(this.extensionRepo.create(draft));
  }

  save(extension: ExtensionEntity): Promise<ExtensionEntity> {
    return this.extensionRepo.save(extension);
  }
}
