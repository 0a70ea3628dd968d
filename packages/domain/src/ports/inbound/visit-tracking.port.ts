import type { LocationPoint } from '../../entities/location-point.js';
import type { NewVisit, VisitRecord, VisitStatus } from '../../entities/visit.js';

export type StartTrigger =
  | { kind: 'manual' }
  | { kind: 'auto_check_in'; fix: LocationPoint; distanceMeters: number };

/** Display state of the visit countdown, derived from trusted timestamps. */
export interface VisitTimerView {
  visitId: string;
  status: VisitStatus;
  now: Date;
  elapsedSeconds: number;
  /** Negative once the visit runs past `scheduledEnd`. */
  remainingSeconds: number;
  isOvertime: boolean;
  isFiveMinuteWarning: boolean;
  elapsedLabel: string;
  remainingLabel: string;
  /** e.g. "5m early"; null when on time or not started. */
  startDeviation: string | null;
}

export interface VisitTrackingPort {
  scheduleVisit(visit: NewVisit): Promise<VisitRecord>;
  getVisit(visitId: string): Promise<VisitRecord>;
  /** Pre-arrival tracking: geofence, auto check-in and ETA while still scheduled. */
  beginTracking(visitId: string): Promise<VisitRecord>;
  start(visitId: string, trigger?: StartTrigger): Promise<VisitRecord>;
  stop(visitId: string): Promise<VisitRecord>;
  cancel(visitId: string, reason: string): Promise<VisitRecord>;
  getTimer(visitId: string): Promise<VisitTimerView>;
}
