import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { TenantEntity } from './entities/tenant.entity';
import { TenantRepository } from './tenant.repository';
import { TypeOrmTenantRepository } from './typeorm-tenant.repository';

@Module({
  imports: [TypeOrmModule.forFeature([TenantEntity])],
  providers: [{ provide: TenantRepository, useClass: TypeOrmTenantRepository }],
  exports: [TenantRepository],
})
export class TenantsModule {}
