import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Brackets, In, Repository } from 'typeorm';
import type { JsonObject } from '../common/json';
import { EventEntity } from './entities/event.entity';
import { EventDraft, EventRepository } from './event.repository';

@Injectable()
export class TypeOrmEventRepository extends EventRepository {
  constructor(
    @InjectRepository(EventEntity)
    private readonly eventRepo: Repository<EventEntity>,
  ) {
    super();
  }

  insert(draft: EventDraft): Promise<EventEntity> {
    return this.eventRepo.save(this.eventRepo.create(draft));
  }

  async findContaining(tenantId: number, candidates: JsonObject[]): Promise<EventEntity[]> {
    if (candidates.length === 0) return [];

    return this.eventRepo
      .createQueryBuilder('event')
      .where('event.tenant_id = :tenantId', { tenantId })
      .andWhere(
        new Brackets((qb) => {
          candidates.forEach((doc, i) => {
            qb.orWhere(`event.payload @> CAST(:doc${i} AS jsonb)`, {
              [`doc${i}`]: JSON.stringify(doc),
            });
          });
        }),
      )
      .orderBy('event.received_at', 'ASC')
      .addOrderBy('event.id', 'ASC')
      .getMany();
  }

  async deleteByIds(tenantId: number, ids: number[]): Promise<number> {
    if (ids.length === 0) return 0;
    const result = await this.eventRepo.delete({ tenant_id: tenantId, id: In(ids) });
    return result.affected ?? 0;
  }
}
