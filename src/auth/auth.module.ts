import { Module } from '@nestjs/common';
import { CacheModule } from '../cache/cache.module';
import { PlatformModule } from '../platform/platform.module';
import { TenantsModule } from '../tenants/tenants.module';
import { WebhooksModule } from '../webhooks/webhooks.module';
import { AuthController } from './auth.controller';
import { AuthService } from './auth.service';

@Module({
  imports: [CacheModule, PlatformModule, TenantsModule, WebhooksModule],
  controllers: [AuthController],
  providers: [AuthService],
})
export class AuthModule {}
