import { Module } from '@nestjs/common';
import { DataPullController } from './data-pull.controller';
import { JobsModule } from './jobs.module';

@Module({
  imports: [JobsModule],
  controllers: [DataPullController],
})
export class DataPullModule {}
