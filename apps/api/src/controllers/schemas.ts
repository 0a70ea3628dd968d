import { z } from 'zod';

export const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((s) => new Date(s));

export const coordinateSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

/** Device fix. Unknown speed, course and accuracy are reported as negative numbers. */
export const locationPointSchema = coordinateSchema.extend({
  altitude: z.number().default(0),
  horizontalAccuracy: z.number(),
  speed: z.number().default(-1),
  course: z.number().default(-1),
  timestamp: isoDate,
});

export const visitIdParamsSchema = z.object({ visitId: z.string().min(1) });
