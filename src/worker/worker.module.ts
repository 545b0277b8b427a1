import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CacheModule } from '../cache/cache.module';
import { configNamespaces } from '../config';
import { DatabaseModule } from '../database/database.module';
import { JobsModule } from '../jobs/jobs.module';
import { PlatformModule } from '../platform/platform.module';
import { CacheJanitor } from './cache-janitor';
import { PullWorker } from './pull.worker';
import { ResourceFetcher } from './resource-fetcher';
import { ResourcePullRunner } from './resource-pull.runner';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: configNamespaces }),
    DatabaseModule,
    CacheModule,
    JobsModule,
    PlatformModule,
  ],
  providers: [ResourceFetcher, ResourcePullRunner, PullWorker, CacheJanitor],
})
export class WorkerModule {}
