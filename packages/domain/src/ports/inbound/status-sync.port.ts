import type { BookingStatus } from '../../entities/booking.js';

export type SyncOutcome =
  | 'applied'
  | 'unchanged'
  | 'stale'
  | 'visit_missing'
  | 'booking_missing'
  | 'failed';

export interface SyncResult {
  visitId: string;
  bookingId?: string;
  outcome: SyncOutcome;
  bookingStatus?: BookingStatus;
}

export interface StatusSyncPort {
  /** Re-derives the booking status from the visit's current state. */
  syncVisit(visitId: string): Promise<SyncResult>;
  /** Re-derives every visit written since `since`. */
  reconcile(since: Date): Promise<SyncResult[]>;
}
