import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { CacheEntryEntity } from '../cache/entities/cache-entry.entity';
import { EventEntity } from '../events/entities/event.entity';
import { ExtensionEntity } from '../extensions/entities/extension.entity';
import { PullTaskEntity } from '../jobs/entities/pull-task.entity';
import { TenantEntity } from '../tenants/entities/tenant.entity';
import { SchemaExtrasService } from './schema-extras.service';

export const ENTITIES = [TenantEntity, ExtensionEntity, EventEntity, PullTaskEntity, CacheEntryEntity];

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService): TypeOrmModuleOptions => {
        const databaseUrl = config.get<string>('database.url');

        const shared = {
          type: 'postgres' as const,
          entities: ENTITIES,
          synchronize: config.get<string>('NODE_ENV') !== 'production',
          // API and worker each hold their own pool
          extra: {
            min: 2,
            max: 20,
            idleTimeoutMillis: 30_000,
            connectionTimeoutMillis: 2_000,
          },
        };

        // Hosted deployments supply DATABASE_URL; individual vars are for local dev
        if (databaseUrl) {
          return { ...shared, url: databaseUrl, ssl: { rejectUnauthorized: false } };
        }

        return {
          ...shared,
          host: config.get<string>('database.host'),
          port: config.get<number>('database.port'),
          username: config.get<string>('database.username'),
          password: config.get<string>('database.password'),
          database: config.get<string>('database.name'),
        };
      },
    }),
  ],
  providers: [SchemaExtrasService],
})
export class DatabaseModule {}
