import type { VisitStatus } from './visit.js';

export type BookingStatus = 'pending' | 'approved' | 'in_progress' | 'completed' | 'cancelled';

export type PaymentStatus = 'pending' | 'confirmed' | 'refunded' | 'failed';

/**
 * Booking as seen by scheduling, billing and notification consumers.
 * `status` is a projection of the linked visit; pricing and payment fields belong to the payment side.
 */
export interface BookingRecord {
  readonly id: string;
  readonly clientId: string;
  readonly workerId: string;
  readonly status: BookingStatus;
  readonly paymentStatus: PaymentStatus;
  readonly scheduledDate: Date;
  readonly price: number;
  readonly lastUpdated: Date;
  /** Visit revision that produced `status`; null until the first sync. */
  readonly syncedRevision: number | null;
}

export interface NewBooking {
  readonly id?: string;
  readonly clientId: string;
  readonly workerId: string;
  readonly status?: BookingStatus;
  readonly paymentStatus?: PaymentStatus;
  readonly scheduledDate: Date;
  readonly price: number;
}

export const VISIT_TO_BOOKING_STATUS: Readonly<Record<VisitStatus, BookingStatus>> = {
  scheduled: 'approved',
  active: 'in_progress',
  completed: 'completed',
  cancelled: 'cancelled',
};

export function bookingStatusFor(visitStatus: VisitStatus): BookingStatus {
  return VISIT_TO_BOOKING_STATUS[visitStatus];
}
