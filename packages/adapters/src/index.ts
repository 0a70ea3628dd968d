// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { getPool, closePool, assertRecordSchema } from './postgres/pool.js';
export type { PoolSettings } from './postgres/pool.js';
export { PgVisitRepository, buildVisitSetClause } from './postgres/visit.repository.js';
export { PgBookingRepository } from './postgres/booking.repository.js';
export { PgWriteFeed, parseWriteNotification, WRITE_FEED_CHANNEL } from './postgres/write-feed.js';
export type { ListenClient, PgWriteFeedOptions } from './postgres/write-feed.js';
export { PgTrustedClock } from './postgres/server-clock.js';
export { mapVisitRow, mapBookingRow } from './postgres/rows.js';
export type { VisitRow, BookingRow } from './postgres/rows.js';

// ─── In-memory Adapters ───────────────────────────────────────────────────────
export { InMemoryWriteFeed } from './memory/write-feed.js';
export { InMemoryVisitRepository } from './memory/visit.repository.js';
export { InMemoryBookingRepository } from './memory/booking.repository.js';
export { createInMemoryRecordStore } from './memory/record-store.js';
export type { InMemoryRecordStore } from './memory/record-store.js';

// ─── HTTP Adapters ────────────────────────────────────────────────────────────
export { NominatimGeocodingAdapter } from './geocoding/nominatim-geocoding.adapter.js';
export type { NominatimOptions } from './geocoding/nominatim-geocoding.adapter.js';
export {
  WebhookNotificationDispatcher,
  ConsoleNotificationDispatcher,
} from './notifications/webhook-notification.adapter.js';

// ─── Clock / RNG ──────────────────────────────────────────────────────────────
export { DeterministicClock, SystemClock } from './clock/clocks.js';
export { SeededRng } from './random/seeded-rng.js';
