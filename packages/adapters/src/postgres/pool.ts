import pg from 'pg';

export interface PoolSettings {
  connectionString?: string;
  max?: number;
  applicationName?: string;
}

let pool: pg.Pool | null = null;

/** Shared pool behind every Pg repository. Settings only apply to the call that creates it. */
export function getPool(settings: PoolSettings = {}): pg.Pool {
  if (!pool) {
    pool = new pg.Pool({
      connectionString: settings.connectionString ?? process.env['DATABASE_URL'],
      max: settings.max ?? 10,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
      application_name: settings.applicationName ?? 'field-visit-api',
    });
    pool.on('error', (err) => {
      console.error('[pg-pool] unexpected error on idle client', err);
    });
  }
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

export interface SchemaProbeRow {
  visits: string | null;
  bookings: string | null;
}

export interface SchemaProbeClient {
  query(text: string): Promise<{ rows: SchemaProbeRow[] }>;
}

/** Throws unless both record tables exist. */
export async function assertRecordSchema(db: SchemaProbeClient = getPool()): Promise<void> {
  const { rows } = await db.query(
    `SELECT to_regclass('field.visits')::text AS visits, to_regclass('field.bookings')::text AS bookings`,
  );
  const probe = rows[0];
  if (!probe?.visits || !probe.bookings) {
    throw new Error('record tables missing; apply db/migrations/001_field_visits.sql');
  }
}
