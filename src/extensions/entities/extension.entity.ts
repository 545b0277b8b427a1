import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { TenantEntity } from '../../tenants/entities/tenant.entity';

export type ExtensionStatus = 'active' | 'inactive';

@Entity('extensions')
@Index(['tenant_id'])
export class ExtensionEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'int' })
  tenant_id!: number;

  @ManyToOne(() => TenantEntity)
  @JoinColumn({ name: 'tenant_id' })
  tenant?: TenantEntity;

  /** Web pixel id assigned by the platform */
  @Column({ type: 'varchar', unique: true, nullable: true })
  platform_id!: string | null;

  /** App-generated correlation key embedded in every storefront event */
  @Column({ type: 'varchar', unique: true })
  account_id!: string;

  @Column({ type: 'varchar', default: 'inactive' })
  status!: ExtensionStatus;

  @Column({ type: 'varchar', nullable: true })
  version!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;
}
