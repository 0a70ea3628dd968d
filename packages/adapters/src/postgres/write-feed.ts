import pg from 'pg';
import type { Notification } from 'pg';
import { z } from 'zod';
import type {
  RecordCollection,
  RecordWriteEvent,
  RecordWriteFeedPort,
  RecordWriteHandler,
} from '@field-visit/domain';

export const WRITE_FEED_CHANNEL = 'field_record_writes';

const WriteNotificationSchema = z.object({
  collection: z.enum(['visits', 'bookings']),
  id: z.string().min(1),
  kind: z.enum(['create', 'update']),
});

/** Parses a `pg_notify` payload from the write trigger; null for anything malformed. */
export function parseWriteNotification(payload: string | undefined): RecordWriteEvent | null {
  if (!payload) return null;
  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch {
    return null;
  }
  const parsed = WriteNotificationSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

/** The slice of `pg.Client` the feed drives. */
export interface ListenClient {
  connect(): Promise<void>;
  query(text: string): Promise<unknown>;
  end(): Promise<void>;
  on(event: 'notification', listener: (msg: Notification) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export interface PgWriteFeedOptions {
  createClient?: (connectionString: string | undefined) => ListenClient;
  /** First reconnect delay; doubles per failed attempt up to `maxReconnectDelayMs`. */
  reconnectDelayMs?: number;
  maxReconnectDelayMs?: number;
}

const defaultClient = (connectionString: string | undefined): ListenClient =>
  new pg.Client({ connectionString, application_name: 'field-visit-feed' });

/**
 * Pushes row writes to subscribers via LISTEN/NOTIFY on a dedicated connection.
 * A pooled client cannot be used: notifications arrive only on the session that issued LISTEN.
 * A connection error drops the client and reconnects with backoff.
 */
export class PgWriteFeed implements RecordWriteFeedPort {
  private client: ListenClient | null = null;
  private readonly handlers = new Map<RecordCollection, Set<RecordWriteHandler>>();
  private readonly createClient: (connectionString: string | undefined) => ListenClient;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private attempts = 0;
  private closed = false;

  constructor(
    private readonly connectionString = process.env['DATABASE_URL'],
    options: PgWriteFeedOptions = {},
  ) {
    this.createClient = options.createClient ?? defaultClient;
    this.baseDelayMs = options.reconnectDelayMs ?? 1_000;
    this.maxDelayMs = options.maxReconnectDelayMs ?? 30_000;
  }

  get isListening(): boolean {
    return this.client !== null;
  }

  subscribe(collection: RecordCollection, handler: RecordWriteHandler): () => void {
    let set = this.handlers.get(collection);
    if (!set) {
      set = new Set();
      this.handlers.set(collection, set);
    }
    set.add(handler);
    return () => {
      this.handlers.get(collection)?.delete(handler);
    };
  }

  async start(): Promise<void> {
    if (this.client) return;
    this.closed = false;
    await this.listen();
    console.log(`[pg-feed] listening on ${WRITE_FEED_CHANNEL}`);
  }

  async close(): Promise<void> {
    this.closed = true;
    this.handlers.clear();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.client) {
      const client = this.client;
      this.client = null;
      await client.end();
    }
  }

  private async listen(): Promise<void> {
    const client = this.createClient(this.connectionString);
    client.on('notification', (msg) => {
      const event = parseWriteNotification(msg.payload);
      if (!event) {
        console.warn(`[pg-feed] ignoring malformed notification on ${msg.channel}`);
        return;
      }
      this.dispatch(event);
    });
    client.on('error', (err) => this.handleError(client, err));
    try {
      await client.connect();
      await client.query(`LISTEN ${WRITE_FEED_CHANNEL}`);
    } catch (err) {
      this.release(client);
      throw err;
    }
    this.client = client;
  }

  private handleError(client: ListenClient, err: Error): void {
    if (client !== this.client) return;
    console.error('[pg-feed] listener connection error', err);
    this.client = null;
    this.release(client);
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.closed || this.reconnectTimer) return;
    const delay = Math.min(this.baseDelayMs * 2 ** this.attempts, this.maxDelayMs);
    this.attempts++;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.listen().then(
        () => {
          if (this.closed) {
            this.release(this.client);
            this.client = null;
            return;
          }
          this.attempts = 0;
          console.log(`[pg-feed] reconnected to ${WRITE_FEED_CHANNEL}`);
        },
        (err: unknown) => {
          console.error('[pg-feed] reconnect failed, retrying', err);
          this.scheduleReconnect();
        },
      );
    }, delay);
  }

  private release(client: ListenClient | null): void {
    client?.end().catch((err: unknown) => {
      console.warn('[pg-feed] error closing listener connection', err);
    });
  }

  private dispatch(event: RecordWriteEvent): void {
    for (const handler of this.handlers.get(event.collection) ?? []) {
      Promise.resolve()
        .then(() => handler(event))
        .catch((err: unknown) => {
          console.error(`[pg-feed] ${event.collection} handler failed for ${event.id}`, err);
        });
    }
  }
}
