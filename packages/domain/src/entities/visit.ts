import type { Coordinate, LocationPoint } from './location-point.js';

export type VisitStatus = 'scheduled' | 'active' | 'completed' | 'cancelled';

export const VISIT_STATUSES: readonly VisitStatus[] = ['scheduled', 'active', 'completed', 'cancelled'];

/** Every edge of the visit state machine; anything not listed is an invalid transition. */
export const ALLOWED_VISIT_TRANSITIONS: Readonly<Record<VisitStatus, readonly VisitStatus[]>> = {
  scheduled: ['active', 'cancelled'],
  active: ['completed', 'cancelled'],
  completed: [],
  cancelled: [],
};

export function canTransitionVisit(from: VisitStatus, to: VisitStatus): boolean {
  return ALLOWED_VISIT_TRANSITIONS[from].includes(to);
}

export interface GeofenceState {
  readonly isInside: boolean;
  readonly enteredAt: Date | null;
  readonly exitedAt: Date | null;
}

export const INITIAL_GEOFENCE_STATE: GeofenceState = {
  isInside: false,
  enteredAt: null,
  exitedAt: null,
};

/** The fix that triggered the automatic start, kept for audit. */
export interface AutoCheckInRecord {
  readonly fix: LocationPoint;
  readonly distanceMeters: number;
  readonly triggeredAt: Date;
}

export interface EtaNotificationRecord {
  readonly distanceMeters: number;
  readonly etaSeconds: number;
  readonly sentAt: Date;
}

export interface VisitRecord {
  readonly id: string;
  readonly bookingId: string;
  readonly workerId: string;
  readonly clientId: string;
  readonly workerName?: string;
  readonly clientName?: string;
  readonly serviceSummary?: string;
  readonly note?: string;
  readonly address: string;
  /** Resolved once from `address`, then reused. */
  readonly destination: Coordinate | null;
  readonly status: VisitStatus;
  readonly scheduledStart: Date;
  readonly scheduledEnd: Date;
  /** Server-assigned; never taken from the device clock. */
  readonly actualStart: Date | null;
  readonly actualEnd: Date | null;
  readonly routePoints: readonly LocationPoint[];
  /** Meters. */
  readonly totalDistance: number;
  readonly autoCheckedIn: boolean;
  readonly autoCheckIn: AutoCheckInRecord | null;
  readonly geofence: GeofenceState;
  readonly etaNotificationSent: boolean;
  readonly etaNotification: EtaNotificationRecord | null;
  readonly cancellationReason: string | null;
  readonly cancelledAt: Date | null;
  /** Incremented by the record store on every write. */
  readonly revision: number;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface NewVisit {
  readonly id?: string;
  readonly bookingId: string;
  readonly workerId: string;
  readonly clientId: string;
  readonly workerName?: string;
  readonly clientName?: string;
  readonly serviceSummary?: string;
  readonly note?: string;
  readonly address: string;
  readonly destination?: Coordinate | null;
  readonly scheduledStart: Date;
  readonly scheduledEnd: Date;
}

/** Fields a single store write may touch. Status changes go through `transition` only. */
export type VisitPatch = Partial<
  Pick<
    VisitRecord,
    | 'destination'
    | 'actualStart'
    | 'actualEnd'
    | 'totalDistance'
    | 'autoCheckedIn'
    | 'autoCheckIn'
    | 'geofence'
    | 'etaNotificationSent'
    | 'etaNotification'
    | 'cancellationReason'
    | 'cancelledAt'
  >
>;

export type VisitTransitionPatch = VisitPatch & { readonly status: VisitStatus };
