import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CacheModule } from '../cache/cache.module';
import { ExtensionsModule } from '../extensions/extensions.module';
import { EventEntity } from './entities/event.entity';
import { EventRepository } from './event.repository';
import { EventsController } from './events.controller';
import { EventsService } from './events.service';
import { RateLimiterService } from './rate-limiter.service';
import { TypeOrmEventRepository } from './typeorm-event.repository';

@Module({
  imports: [TypeOrmModule.forFeature([EventEntity]), ExtensionsModule, CacheModule],
  controllers: [EventsController],
  providers: [
    EventsService,
    RateLimiterService,
    { provide: EventRepository, useClass: TypeOrmEventRepository },
  ],
  exports: [EventRepository],
})
export class EventsModule {}
