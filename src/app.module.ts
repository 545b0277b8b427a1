import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { AuthModule } from './auth/auth.module';
import { configNamespaces } from './config';
import { DatabaseModule } from './database/database.module';
import { EventsModule } from './events/events.module';
import { ExtensionsModule } from './extensions/extensions.module';
import { HealthModule } from './health/health.module';
import { DataPullModule } from './jobs/data-pull.module';
import { WebhooksModule } from './webhooks/webhooks.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: configNamespaces,
    }),
    DatabaseModule,
    AuthModule,
    WebhooksModule,
    ExtensionsModule,
    EventsModule,
    DataPullModule,
    HealthModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
