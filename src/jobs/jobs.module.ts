import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CacheModule } from '../cache/cache.module';
import { BulkPullService } from './bulk-pull.service';
import { PullTaskEntity } from './entities/pull-task.entity';
import { TaskQueue } from './task-queue';
import { TaskStore } from './task-store.service';
import { TypeOrmTaskQueue } from './typeorm-task.queue';

/** Job state and queue, shared by the API and the worker process */
@Module({
  imports: [TypeOrmModule.forFeature([PullTaskEntity]), CacheModule],
  providers: [TaskStore, BulkPullService, { provide: TaskQueue, useClass: TypeOrmTaskQueue }],
  exports: [TaskStore, BulkPullService, TaskQueue],
})
export class JobsModule {}
