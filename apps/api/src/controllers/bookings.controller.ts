import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { BookingNotFoundError } from '@field-visit/domain';
import type { BookingRepositoryPort } from '@field-visit/domain';
import { isoDate } from './schemas.js';

const createBookingSchema = z.object({
  id: z.string().min(1).optional(),
  clientId: z.string().min(1),
  workerId: z.string().min(1),
  status: z.enum(['pending', 'approved', 'in_progress', 'completed', 'cancelled']).optional(),
  paymentStatus: z.enum(['pending', 'confirmed', 'refunded', 'failed']).optional(),
  scheduledDate: isoDate,
  price: z.number().nonnegative(),
});

export function createBookingsRouter(bookings: BookingRepositoryPort): Router {
  const router = Router();

  /** POST /api/bookings — written by the scheduling side; status is owned by the synchronizer afterwards */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = createBookingSchema.parse(req.body);
      res.status(201).json(await bookings.create(body));
    } catch (err) {
      next(err);
    }
  });

  router.get('/:bookingId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { bookingId } = z.object({ bookingId: z.string().min(1) }).parse(req.params);
      const booking = await bookings.findById(bookingId);
      if (!booking) throw new BookingNotFoundError(bookingId);
      res.json(booking);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
