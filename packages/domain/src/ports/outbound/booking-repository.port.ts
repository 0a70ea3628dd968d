import type { BookingRecord, BookingStatus, NewBooking } from '../../entities/booking.js';

export interface BookingStatusWrite {
  status: BookingStatus;
  lastUpdated: Date;
  /** Revision of the visit the status was derived from. */
  visitRevision: number;
}

export interface BookingRepositoryPort {
  findById(bookingId: string): Promise<BookingRecord | null>;
  create(booking: NewBooking): Promise<BookingRecord>;
  /**
   * Writes only `status`, `lastUpdated` and `syncedRevision`, and only when the stored
   * `syncedRevision` is null or older than `visitRevision`. Resolves null when skipped.
   */
  applyStatusProjection(bookingId: string, write: BookingStatusWrite): Promise<BookingRecord | null>;
}
