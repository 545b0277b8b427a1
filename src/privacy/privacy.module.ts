import { Module } from '@nestjs/common';
import { EventsModule } from '../events/events.module';
import { TenantsModule } from '../tenants/tenants.module';
import { PrivacyService } from './privacy.service';

@Module({
  imports: [TenantsModule, EventsModule],
  providers: [PrivacyService],
  exports: [PrivacyService],
})
export class PrivacyModule {}
