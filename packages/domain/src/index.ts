// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/location-point.js';
export * from './entities/visit.js';
export * from './entities/booking.js';
export * from './entities/eta-estimate.js';
export * from './entities/tracking-config.js';

// ─── Geometry ─────────────────────────────────────────────────────────────────
export * from './geo/haversine.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors/visit-errors.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/visit-tracking.port.js';
export * from './ports/inbound/location-ingestion.port.js';
export * from './ports/inbound/status-sync.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/visit-repository.port.js';
export * from './ports/outbound/booking-repository.port.js';
export * from './ports/outbound/record-write-feed.port.js';
export * from './ports/outbound/geocoding.port.js';
export * from './ports/outbound/notification-dispatcher.port.js';
export * from './ports/outbound/clock.port.js';
export * from './ports/outbound/location-sensor.port.js';
export * from './ports/outbound/region-monitor.port.js';
export * from './ports/outbound/stream-publisher.port.js';
