import type { ClockPort } from '@field-visit/domain';
import { getPool } from './pool.js';

/** Lifecycle timestamps come from the database server, not from the API host or the device. */
export class PgTrustedClock implements ClockPort {
  async now(): Promise<Date> {
    const { rows } = await getPool().query<{ now: Date }>(`SELECT NOW() AS now`);
    const row = rows[0];
    if (!row) throw new Error('SELECT NOW() returned no row');
    return row.now;
  }
}
