import type {
  BookingRecord,
  BookingRepositoryPort,
  BookingStatusWrite,
  NewBooking,
} from '@field-visit/domain';
import { getPool } from './pool.js';
import { mapBookingRow, type BookingRow } from './rows.js';

export class PgBookingRepository implements BookingRepositoryPort {
  async findById(bookingId: string): Promise<BookingRecord | null> {
    const { rows } = await getPool().query<BookingRow>(
      `SELECT * FROM field.bookings WHERE id = $1`,
      [bookingId],
    );
    return rows[0] ? mapBookingRow(rows[0]) : null;
  }

  async create(booking: NewBooking): Promise<BookingRecord> {
    const { rows } = await getPool().query<BookingRow>(
      `INSERT INTO field.bookings
        (id, client_id, worker_id, status, payment_status, scheduled_date, price, last_updated)
       VALUES (COALESCE($1, gen_random_uuid()::text),$2,$3,$4,$5,$6,$7,NOW())
       RETURNING *`,
      [
        booking.id ?? null,
        booking.clientId,
        booking.workerId,
        booking.status ?? 'pending',
        booking.paymentStatus ?? 'pending',
        booking.scheduledDate,
        booking.price,
      ],
    );
    const row = rows[0];
    if (!row) throw new Error(`insert of booking for client ${booking.clientId} returned no row`);
    return mapBookingRow(row);
  }

  async applyStatusProjection(
    bookingId: string,
    write: BookingStatusWrite,
  ): Promise<BookingRecord | null> {
    const { rows } = await getPool().query<BookingRow>(
      `UPDATE field.bookings SET
         status = $2,
         last_updated = $3,
         synced_revision = $4
       WHERE id = $1 AND (synced_revision IS NULL OR synced_revision < $4)
       RETURNING *`,
      [bookingId, write.status, write.lastUpdated, write.visitRevision],
    );
    return rows[0] ? mapBookingRow(rows[0]) : null;
  }
}
