import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CacheEntryEntity } from './entities/cache-entry.entity';
import { KeyValueCache } from './key-value.cache';
import { PostgresCache } from './postgres.cache';

@Module({
  imports: [TypeOrmModule.forFeature([CacheEntryEntity])],
  providers: [{ provide: KeyValueCache, useClass: PostgresCache }],
  exports: [KeyValueCache],
})
export class CacheModule {}
