import { jest } from '@jest/globals';
import { EARTH_RADIUS_METERS, INITIAL_GEOFENCE_STATE } from '@field-visit/domain';
import type {
  BookingRecord,
  Coordinate,
  EtaEstimate,
  GeocodingPort,
  LocationPoint,
  NotificationDispatcherPort,
  NotificationKind,
  NotificationRequest,
  SamplingProfile,
  StreamPublisherPort,
  VisitRecord,
} from '@field-visit/domain';
import type { Logger } from '../lib/logger.js';

export const DEST: Coordinate = { latitude: 51.5007, longitude: -0.1246 };

/** 09:50Z on the day of the test visit, scheduled 10:00–11:00Z. */
export const T0 = Date.parse('2026-03-02T09:50:00Z');

export function north(origin: Coordinate, meters: number): Coordinate {
  return {
    latitude: origin.latitude + (meters / EARTH_RADIUS_METERS) * (180 / Math.PI),
    longitude: origin.longitude,
  };
}

/** A fix `meters` due north of DEST, `offsetS` seconds after T0. */
export function fixAt(meters: number, offsetS: number, accuracy = 10): LocationPoint {
  return {
    ...north(DEST, meters),
    altitude: 12,
    horizontalAccuracy: accuracy,
    speed: 1.4,
    course: 180,
    timestamp: new Date(T0 + offsetS * 1000),
  };
}

export function makeVisit(overrides: Partial<VisitRecord> = {}): VisitRecord {
  return {
    id: 'v-1',
    bookingId: 'b-1',
    workerId: 'w-1',
    clientId: 'c-1',
    address: '1 Test Street',
    destination: DEST,
    status: 'scheduled',
    scheduledStart: new Date('2026-03-02T10:00:00Z'),
    scheduledEnd: new Date('2026-03-02T11:00:00Z'),
    actualStart: null,
    actualEnd: null,
    routePoints: [],
    totalDistance: 0,
    autoCheckedIn: false,
    autoCheckIn: null,
    geofence: INITIAL_GEOFENCE_STATE,
    etaNotificationSent: false,
    etaNotification: null,
    cancellationReason: null,
    cancelledAt: null,
    revision: 1,
    createdAt: new Date(T0 - 86_400_000),
    updatedAt: new Date(T0 - 86_400_000),
    ...overrides,
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  debug: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export class RecordingNotifier implements NotificationDispatcherPort {
  readonly sent: NotificationRequest[] = [];

  async dispatch(request: NotificationRequest): Promise<void> {
    this.sent.push(request);
  }

  ofType(type: NotificationKind): NotificationRequest[] {
    return this.sent.filter((n) => n.metadata.type === type);
  }
}

export class RecordingPublisher implements StreamPublisherPort {
  readonly visits: VisitRecord[] = [];
  readonly bookings: BookingRecord[] = [];
  readonly etas: EtaEstimate[] = [];
  readonly modes: Array<{ visitId: string; profile: SamplingProfile }> = [];

  async publishVisit(visit: VisitRecord): Promise<void> {
    this.visits.push(visit);
  }

  async publishBooking(booking: BookingRecord): Promise<void> {
    this.bookings.push(booking);
  }

  async publishEta(estimate: EtaEstimate): Promise<void> {
    this.etas.push(estimate);
  }

  async publishSamplingMode(visitId: string, profile: SamplingProfile): Promise<void> {
    this.modes.push({ visitId, profile });
  }
}

/** Resolves every address to the same result, or rejects with the given error. */
export class StaticGeocoder implements GeocodingPort {
  readonly resolveAddress = jest.fn(async (_address: string): Promise<Coordinate | null> => {
    if (this.result instanceof Error) throw this.result;
    return this.result;
  });

  constructor(private readonly result: Coordinate | null | Error = DEST) {}
}
