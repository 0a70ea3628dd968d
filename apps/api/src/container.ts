import {
  ConsoleNotificationDispatcher,
  createInMemoryRecordStore,
  NominatimGeocodingAdapter,
  PgBookingRepository,
  PgTrustedClock,
  PgVisitRepository,
  PgWriteFeed,
  SystemClock,
  WebhookNotificationDispatcher,
} from '@field-visit/adapters';
import type {
  BookingRepositoryPort,
  ClockPort,
  GeocodingPort,
  NotificationDispatcherPort,
  RecordWriteFeedPort,
  TrackingConfig,
  VisitRepositoryPort,
} from '@field-visit/domain';
import type { ServerConfig } from './config/server-config.js';
import type { Logger } from './lib/logger.js';
import { StatusSynchronizer } from './services/sync/status-synchronizer.js';
import { VisitTrackingService } from './services/visits/visit-tracking.service.js';
import type { FixDrivenRegionMonitor } from './services/tracking/fix-driven-region-monitor.js';
import { DeferredStreamPublisher } from './ws/ws-gateway.js';

export interface RecordStore {
  visits: VisitRepositoryPort;
  bookings: BookingRepositoryPort;
  feed: RecordWriteFeedPort;
}

export interface AppContainer extends RecordStore {
  storeKind: ServerConfig['RECORD_STORE'];
  clock: ClockPort;
  publisher: DeferredStreamPublisher;
  tracking: VisitTrackingService;
  synchronizer: StatusSynchronizer;
}

export interface ContainerOptions {
  server: Pick<ServerConfig, 'RECORD_STORE' | 'DATABASE_URL' | 'GEOCODER_BASE_URL' | 'NOTIFY_WEBHOOK_URL'>;
  tracking?: TrackingConfig;
  store?: RecordStore;
  clock?: ClockPort;
  geocoder?: GeocodingPort;
  notifier?: NotificationDispatcherPort;
  createRegionMonitor?: () => FixDrivenRegionMonitor;
  logger?: Logger;
}

function buildStore(server: ContainerOptions['server']): RecordStore {
  if (server.RECORD_STORE === 'memory') return createInMemoryRecordStore();
  return {
    visits: new PgVisitRepository(),
    bookings: new PgBookingRepository(),
    feed: new PgWriteFeed(server.DATABASE_URL),
  };
}

/** Wires ports to adapters. Anything passed in `opts` replaces the configured adapter. */
export function buildContainer(opts: ContainerOptions): AppContainer {
  const { server } = opts;
  const store = opts.store ?? buildStore(server);
  const clock = opts.clock ?? (server.RECORD_STORE === 'postgres' ? new PgTrustedClock() : new SystemClock());
  const geocoder = opts.geocoder ?? new NominatimGeocodingAdapter({ baseUrl: server.GEOCODER_BASE_URL });
  const notifier =
    opts.notifier ??
    (server.NOTIFY_WEBHOOK_URL
      ? new WebhookNotificationDispatcher(server.NOTIFY_WEBHOOK_URL)
      : new ConsoleNotificationDispatcher());
  const publisher = new DeferredStreamPublisher();

  const tracking = new VisitTrackingService({
    visits: store.visits,
    geocoder,
    notifier,
    clock,
    publisher,
    config: opts.tracking,
    createRegionMonitor: opts.createRegionMonitor,
    logger: opts.logger,
  });
  const synchronizer = new StatusSynchronizer({
    visits: store.visits,
    bookings: store.bookings,
    feed: store.feed,
    notifier,
    clock,
    publisher,
    logger: opts.logger,
  });

  return { ...store, storeKind: server.RECORD_STORE, clock, publisher, tracking, synchronizer };
}
