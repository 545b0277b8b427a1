import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { isRecord } from '../common/json';
import { KeyValueCache } from './key-value.cache';

type Row = Record<string, unknown>;

@Injectable()
export class PostgresCache extends KeyValueCache {
  constructor(private readonly dataSource: DataSource) {
    super();
  }

  async get(key: string): Promise<unknown> {
    const rows = await this.run(
      `SELECT value FROM cache_entries WHERE key = $1 AND expires_at > now()`,
      [key],
    );
    return rows[0]?.value;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    await this.run(
      `INSERT INTO cache_entries (key, value, expires_at)
       VALUES ($1, $2::jsonb, now() + make_interval(secs => $3))
       ON CONFLICT (key) DO UPDATE
         SET value = EXCLUDED.value, expires_at = EXCLUDED.expires_at`,
      [key, JSON.stringify(value), ttlSeconds],
    );
  }

  async take(key: string): Promise<unknown> {
    const rows = await this.run(
      `DELETE FROM cache_entries WHERE key = $1 RETURNING value, expires_at > now() AS live`,
      [key],
    );
    const row = rows[0];
    return row && row.live === true ? row.value : undefined;
  }

  async delete(key: string): Promise<void> {
    await this.run(`DELETE FROM cache_entries WHERE key = $1`, [key]);
  }

  async increment(key: string, ttlSeconds: number): Promise<number> {
    // An expired counter restarts at 1 with a fresh expiry
    const rows = await this.run(
      `INSERT INTO cache_entries (key, value, expires_at)
       VALUES ($1, '1'::jsonb, now() + make_interval(secs => $2))
       ON CONFLICT (key) DO UPDATE SET
         value = CASE WHEN cache_entries.expires_at > now()
                      THEN to_jsonb((cache_entries.value #>> '{}')::bigint + 1)
                      ELSE '1'::jsonb END,
         expires_at = CASE WHEN cache_entries.expires_at > now()
                           THEN cache_entries.expires_at
                           ELSE EXCLUDED.expires_at END
       RETURNING value`,
      [key, ttlSeconds],
    );
    return Number(rows[0]?.value ?? 0);
  }

  async purgeExpired(): Promise<number> {
    const rows = await this.run(
      `DELETE FROM cache_entries WHERE expires_at <= now() RETURNING key`,
      [],
    );
    return rows.length;
  }

  /** Runs raw SQL and returns its rows for SELECT and DML ... RETURNING alike */
  private async run(sql: string, params: unknown[]): Promise<Row[]> {
    const runner = this.dataSource.createQueryRunner();
    try {
      const result: unknown = await runner.query(sql, params, true);
      const records = isRecord(result) ? result.records : undefined;
      return Array.isArray(records) ? records.filter(isRecord) : [];
    } finally {
      await runner.release();
    }
  }
}
