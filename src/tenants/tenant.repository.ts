import { TenantEntity } from './entities/tenant.entity';

export interface InstallationInput {
  shopDomain: string;
  accessToken: string;
  scopes: string[] | null;
}

export interface TenantErasure {
  events: number;
  extensions: number;
}

/** Persistence seam for tenants. Nest resolves it to the TypeORM implementation. */
export abstract class TenantRepository {
  abstract findByDomain(shopDomain: string): Promise<TenantEntity | null>;

  /** Creates the tenant on first install; re-installation updates the existing row */
  abstract saveInstallation(input: InstallationInput): Promise<TenantEntity>;

  /** Clears the credential and installation flag without touching stored data */
  abstract markUninstalled(tenantId: number): Promise<void>;

  /**
   * Deletes every event and extension of the tenant, then clears its credential and
   * installation flag, all in one transaction.
   */
  abstract eraseTenantData(tenantId: number): Promise<TenantErasure>;
}
