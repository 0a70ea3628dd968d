import type {
  AutoCheckInRecord,
  BookingRecord,
  BookingStatus,
  EtaNotificationRecord,
  GeofenceState,
  LocationPoint,
  PaymentStatus,
  VisitRecord,
  VisitStatus,
} from '@field-visit/domain';

// jsonb columns come back with timestamps as ISO strings.
export interface StoredFix {
  latitude: number;
  longitude: number;
  altitude: number;
  horizontalAccuracy: number;
  speed: number;
  course: number;
  timestamp: string;
}

export interface StoredGeofence {
  isInside: boolean;
  enteredAt: string | null;
  exitedAt: string | null;
}

export interface StoredAutoCheckIn {
  fix: StoredFix;
  distanceMeters: number;
  triggeredAt: string;
}

export interface StoredEtaNotification {
  distanceMeters: number;
  etaSeconds: number;
  sentAt: string;
}

export interface VisitRow {
  id: string;
  booking_id: string;
  worker_id: string;
  client_id: string;
  worker_name: string | null;
  client_name: string | null;
  service_summary: string | null;
  note: string | null;
  address: string;
  destination_lat: number | null;
  destination_lng: number | null;
  status: VisitStatus;
  scheduled_start: Date;
  scheduled_end: Date;
  actual_start: Date | null;
  actual_end: Date | null;
  route_points: StoredFix[];
  total_distance: number;
  auto_checked_in: boolean;
  auto_check_in: StoredAutoCheckIn | null;
  geofence: StoredGeofence;
  eta_notification_sent: boolean;
  eta_notification: StoredEtaNotification | null;
  cancellation_reason: string | null;
  cancelled_at: Date | null;
  revision: number;
  created_at: Date;
  updated_at: Date;
}

export interface BookingRow {
  id: string;
  client_id: string;
  worker_id: string;
  status: BookingStatus;
  payment_status: PaymentStatus;
  scheduled_date: Date;
  /** NUMERIC arrives as a string. */
  price: string;
  last_updated: Date;
  synced_revision: number | null;
}

function toDate(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

export function mapStoredFix(fix: StoredFix): LocationPoint {
  return { ...fix, timestamp: new Date(fix.timestamp) };
}

function mapGeofence(g: StoredGeofence): GeofenceState {
  return { isInside: g.isInside, enteredAt: toDate(g.enteredAt), exitedAt: toDate(g.exitedAt) };
}

function mapAutoCheckIn(a: StoredAutoCheckIn | null): AutoCheckInRecord | null {
  if (!a) return null;
  return { fix: mapStoredFix(a.fix), distanceMeters: a.distanceMeters, triggeredAt: new Date(a.triggeredAt) };
}

function mapEtaNotification(e: StoredEtaNotification | null): EtaNotificationRecord | null {
  if (!e) return null;
  return { distanceMeters: e.distanceMeters, etaSeconds: e.etaSeconds, sentAt: new Date(e.sentAt) };
}

export function mapVisitRow(row: VisitRow): VisitRecord {
  return {
    id: row.id,
    bookingId: row.booking_id,
    workerId: row.worker_id,
    clientId: row.client_id,
    ...(row.worker_name !== null ? { workerName: row.worker_name } : {}),
    ...(row.client_name !== null ? { clientName: row.client_name } : {}),
    ...(row.service_summary !== null ? { serviceSummary: row.service_summary } : {}),
    ...(row.note !== null ? { note: row.note } : {}),
    address: row.address,
    destination:
      row.destination_lat !== null && row.destination_lng !== null
        ? { latitude: row.destination_lat, longitude: row.destination_lng }
        : null,
    status: row.status,
    scheduledStart: row.scheduled_start,
    scheduledEnd: row.scheduled_end,
    actualStart: row.actual_start,
    actualEnd: row.actual_end,
    routePoints: row.route_points.map(mapStoredFix),
    totalDistance: row.total_distance,
    autoCheckedIn: row.auto_checked_in,
    autoCheckIn: mapAutoCheckIn(row.auto_check_in),
    geofence: mapGeofence(row.geofence),
    etaNotificationSent: row.eta_notification_sent,
    etaNotification: mapEtaNotification(row.eta_notification),
    cancellationReason: row.cancellation_reason,
    cancelledAt: row.cancelled_at,
    revision: row.revision,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function mapBookingRow(row: BookingRow): BookingRecord {
  return {
    id: row.id,
    clientId: row.client_id,
    workerId: row.worker_id,
    status: row.status,
    paymentStatus: row.payment_status,
    scheduledDate: row.scheduled_date,
    price: Number(row.price),
    lastUpdated: row.last_updated,
    syncedRevision: row.synced_revision,
  };
}
