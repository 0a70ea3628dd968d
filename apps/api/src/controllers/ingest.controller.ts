import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { LocationIngestionPort } from '@field-visit/domain';
import { isoDate, locationPointSchema, visitIdParamsSchema } from './schemas.js';

const fixBatchSchema = z.object({
  fixes: z.array(locationPointSchema).min(1).max(500),
});

const regionEventSchema = z.object({
  transition: z.enum(['enter', 'exit']),
  at: isoDate,
});

export function createIngestRouter(ingestion: LocationIngestionPort): Router {
  const router = Router();

  /** POST /api/ingest/visits/:visitId/fixes : batch of device fixes, oldest first */
  router.post('/visits/:visitId/fixes', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { visitId } = visitIdParamsSchema.parse(req.params);
      const { fixes } = fixBatchSchema.parse(req.body);
      const result = await ingestion.ingestFixes(visitId, fixes);
      res.status(202).json(result);
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/ingest/visits/:visitId/region-events : crossings detected on the device */
  router.post('/visits/:visitId/region-events', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { visitId } = visitIdParamsSchema.parse(req.params);
      const { transition, at } = regionEventSchema.parse(req.body);
      await ingestion.reportRegionEvent(visitId, transition, at);
      res.status(202).json({ ok: true });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
