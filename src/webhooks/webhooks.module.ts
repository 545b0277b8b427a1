import { Module } from '@nestjs/common';
import { PlatformModule } from '../platform/platform.module';
import { PrivacyModule } from '../privacy/privacy.module';
import { TenantsModule } from '../tenants/tenants.module';
import { WebhookRegistrationService } from './webhook-registration.service';
import { WebhooksController } from './webhooks.controller';
import { WebhooksService } from './webhooks.service';

@Module({
  imports: [TenantsModule, PrivacyModule, PlatformModule],
  controllers: [WebhooksController],
  providers: [WebhooksService, WebhookRegistrationService],
  exports: [WebhookRegistrationService],
})
export class WebhooksModule {}
