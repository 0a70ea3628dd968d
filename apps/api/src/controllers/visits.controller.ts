import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { BookingNotFoundError } from '@field-visit/domain';
import type { BookingRepositoryPort, VisitTrackingPort } from '@field-visit/domain';
import { coordinateSchema, isoDate, visitIdParamsSchema } from './schemas.js';

const createVisitSchema = z
  .object({
    id: z.string().min(1).optional(),
    bookingId: z.string().min(1),
    workerId: z.string().min(1),
    clientId: z.string().min(1),
    workerName: z.string().max(120).optional(),
    clientName: z.string().max(120).optional(),
    serviceSummary: z.string().max(500).optional(),
    note: z.string().max(2000).optional(),
    address: z.string().min(1).max(500),
    destination: coordinateSchema.optional(),
    scheduledStart: isoDate,
    scheduledEnd: isoDate,
  })
  .refine((v) => v.scheduledEnd.getTime() > v.scheduledStart.getTime(), {
    message: 'scheduledEnd must be after scheduledStart',
    path: ['scheduledEnd'],
  });

const cancelBodySchema = z.object({
  reason: z.string().min(1).max(500),
});

export interface VisitsRouterDeps {
  tracking: VisitTrackingPort;
  bookings: BookingRepositoryPort;
}

export function createVisitsRouter({ tracking, bookings }: VisitsRouterDeps): Router {
  const router = Router();

  /** POST /api/visits — schedule a visit against an existing booking */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = createVisitSchema.parse(req.body);
      const booking = await bookings.findById(body.bookingId);
      if (!booking) throw new BookingNotFoundError(body.bookingId);
      const visit = await tracking.scheduleVisit(body);
      res.status(201).json(visit);
    } catch (err) {
      next(err);
    }
  });

  router.get('/:visitId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { visitId } = visitIdParamsSchema.parse(req.params);
      res.json(await tracking.getVisit(visitId));
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/visits/:visitId/timer — countdown display state against the trusted clock */
  router.get('/:visitId/timer', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { visitId } = visitIdParamsSchema.parse(req.params);
      res.json(await tracking.getTimer(visitId));
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/visits/:visitId/track — pre-arrival tracking while the worker travels */
  router.post('/:visitId/track', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { visitId } = visitIdParamsSchema.parse(req.params);
      res.json(await tracking.beginTracking(visitId));
    } catch (err) {
      next(err);
    }
  });

  router.post('/:visitId/start', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { visitId } = visitIdParamsSchema.parse(req.params);
      res.json(await tracking.start(visitId));
    } catch (err) {
      next(err);
    }
  });

  router.post('/:visitId/stop', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { visitId } = visitIdParamsSchema.parse(req.params);
      res.json(await tracking.stop(visitId));
    } catch (err) {
      next(err);
    }
  });

  router.post('/:visitId/cancel', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { visitId } = visitIdParamsSchema.parse(req.params);
      const { reason } = cancelBodySchema.parse(req.body);
      res.json(await tracking.cancel(visitId, reason));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
