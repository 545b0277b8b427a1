import { Column, Entity, Index, PrimaryColumn } from 'typeorm';

@Entity('cache_entries')
export class CacheEntryEntity {
  @PrimaryColumn({ type: 'varchar' })
  key!: string;

  @Column({ type: 'jsonb' })
  value!: unknown;

  @Index()
  @Column({ type: 'timestamptz' })
  expires_at!: Date;
}
