import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { DataSource } from 'typeorm';

/** Indexes TypeORM's decorators cannot express. IF NOT EXISTS keeps this safe on every start. */
@Injectable()
export class SchemaExtrasService implements OnApplicationBootstrap {
  private readonly logger = new Logger(SchemaExtrasService.name);

  constructor(private readonly dataSource: DataSource) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.dataSource.query(
      `CREATE INDEX IF NOT EXISTS "IDX_events_payload_gin" ON events USING gin (payload jsonb_path_ops)`,
    );
    this.logger.log('Payload containment index ready.');
  }
}
