import { randomUUID } from 'node:crypto';
import type {
  BookingRecord,
  BookingRepositoryPort,
  BookingStatusWrite,
  NewBooking,
} from '@field-visit/domain';
import type { InMemoryWriteFeed } from './write-feed.js';

export class InMemoryBookingRepository implements BookingRepositoryPort {
  private readonly rows = new Map<string, BookingRecord>();

  constructor(
    private readonly feed?: InMemoryWriteFeed,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async findById(bookingId: string): Promise<BookingRecord | null> {
    return this.rows.get(bookingId) ?? null;
  }

  async create(booking: NewBooking): Promise<BookingRecord> {
    const record: BookingRecord = {
      id: booking.id ?? randomUUID(),
      clientId: booking.clientId,
      workerId: booking.workerId,
      status: booking.status ?? 'pending',
      paymentStatus: booking.paymentStatus ?? 'pending',
      scheduledDate: booking.scheduledDate,
      price: booking.price,
      lastUpdated: this.now(),
      syncedRevision: null,
    };
    this.rows.set(record.id, record);
    this.feed?.emit({ collection: 'bookings', id: record.id, kind: 'create' });
    return record;
  }

  async applyStatusProjection(
    bookingId: string,
    write: BookingStatusWrite,
  ): Promise<BookingRecord | null> {
    const row = this.rows.get(bookingId);
    if (!row) return null;
    if (row.syncedRevision !== null && row.syncedRevision >= write.visitRevision) return null;

    const record: BookingRecord = {
      ...row,
      status: write.status,
      lastUpdated: write.lastUpdated,
      syncedRevision: write.visitRevision,
    };
    this.rows.set(bookingId, record);
    this.feed?.emit({ collection: 'bookings', id: bookingId, kind: 'update' });
    return record;
  }
}
