import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { ExtensionEntity } from '../../extensions/entities/extension.entity';
import { TenantEntity } from '../../tenants/entities/tenant.entity';
import type { JsonObject } from '../../common/json';

@Entity('events')
@Index(['tenant_id'])
@Index(['account_id'])
@Index(['event_name'])
@Index(['received_at'])
// GIN index for jsonb containment, created by SchemaExtrasService
@Index('IDX_events_payload_gin', { synchronize: false })
export class EventEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'int' })
  tenant_id!: number;

  @ManyToOne(() => TenantEntity)
  @JoinColumn({ name: 'tenant_id' })
  tenant?: TenantEntity;

  @Column({ type: 'varchar' })
  account_id!: string;

  @ManyToOne(() => ExtensionEntity)
  @JoinColumn({ name: 'account_id', referencedColumnName: 'account_id' })
  extension?: ExtensionEntity;

  @Column({ type: 'varchar' })
  event_name!: string;

  @Column({ type: 'jsonb' })
  payload!: JsonObject;

  @CreateDateColumn({ type: 'timestamptz' })
  received_at!: Date;
}
