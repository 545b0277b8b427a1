import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import type { PullMode, ResourceType } from '../../common/constants';

export type PullTaskStatus = 'queued' | 'claimed' | 'done';

/** Queue row for one resource pull, consumed by the worker process */
@Entity('pull_tasks')
@Index(['status', 'created_at'])
export class PullTaskEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', unique: true })
  job_id!: string;

  @Column({ type: 'varchar' })
  shop_domain!: string;

  /** Cleared once the task is done */
  @Column({ type: 'text' })
  access_token!: string;

  @Column({ type: 'varchar' })
  resource_type!: ResourceType;

  @Column({ type: 'varchar' })
  mode!: PullMode;

  @Column({ type: 'int' })
  batch_size!: number;

  @Column({ type: 'varchar', default: 'queued' })
  status!: PullTaskStatus;

  @Column({ type: 'varchar', nullable: true })
  claimed_by!: string | null;

  @Column({ type: 'timestamptz', nullable: true })
  claimed_at!: Date | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;
}
