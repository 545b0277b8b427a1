import { ExtensionEntity, ExtensionStatus } from './entities/extension.entity';

export interface ExtensionDraft {
  tenant_id: number;
  platform_id: string | null;
  account_id: string;
  status: ExtensionStatus;
  version: string | null;
}

export abstract class ExtensionRepository {
  abstract findByAccountId(accountId: string): Promise<ExtensionEntity | null>;

  abstract findByPlatformId(tenantId: number, platformId: string): Promise<ExtensionEntity | null>;

  /** Most recently updated extension of the tenant */
  abstract findLatestForTenant(tenantId: number): Promise<ExtensionEntity | null>;

  abstract create(draft: ExtensionDraft): Promise<ExtensionEntity>;

  abstract save(extension: ExtensionEntity): Promise<ExtensionEntity>;
}
