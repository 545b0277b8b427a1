import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PlatformModule } from '../platform/platform.module';
import { TenantsModule } from '../tenants/tenants.module';
import { ExtensionEntity } from './entities/extension.entity';
import { ExtensionRepository } from './extension.repository';
import { ExtensionsController } from './extensions.controller';
import { ExtensionsService } from './extensions.service';
import { TypeOrmExtensionRepository } from './typeorm-extension.repository';

@Module({
  imports: [TypeOrmModule.forFeature([ExtensionEntity]), TenantsModule, PlatformModule],
  controllers: [ExtensionsController],
  providers: [
    ExtensionsService,
    { provide: ExtensionRepository, useClass: TypeOrmExtensionRepository },
  ],
  exports: [ExtensionRepository],
})
export class ExtensionsModule {}
