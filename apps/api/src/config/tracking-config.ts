import { z } from 'zod';
import { DEFAULT_TRACKING_CONFIG, type TrackingConfig } from '@field-visit/domain';

const d = DEFAULT_TRACKING_CONFIG;

const TrackingEnvSchema = z
  .object({
    GEOFENCE_RADIUS_M: z.coerce.number().positive().default(d.geofenceRadiusMeters),
    AUTO_CHECKIN_RADIUS_M: z.coerce.number().positive().default(d.autoCheckInRadiusMeters),
    ROUTE_INTERVAL_MS: z.coerce.number().int().positive().default(d.routeIntervalMs),
    MAX_HORIZONTAL_ACCURACY_M: z.coerce.number().positive().default(d.maxHorizontalAccuracyMeters),
    ETA_WINDOW_MIN_S: z.coerce.number().nonnegative().default(d.etaWindow.minSeconds),
    ETA_WINDOW_MAX_S: z.coerce.number().positive().default(d.etaWindow.maxSeconds),
    WALKING_SPEED_MPS: z.coerce.number().positive().default(d.averageWalkingSpeedMps),
  })
  .refine((env) => env.ETA_WINDOW_MIN_S < env.ETA_WINDOW_MAX_S, {
    message: 'ETA_WINDOW_MIN_S must be below ETA_WINDOW_MAX_S',
    path: ['ETA_WINDOW_MIN_S'],
  })
  .refine((env) => env.AUTO_CHECKIN_RADIUS_M <= env.GEOFENCE_RADIUS_M, {
    message: 'AUTO_CHECKIN_RADIUS_M must not exceed GEOFENCE_RADIUS_M',
    path: ['AUTO_CHECKIN_RADIUS_M'],
  });

/** Tracking constants from the environment, falling back to the defaults per variable. */
export function loadTrackingConfig(env: NodeJS.ProcessEnv = process.env): TrackingConfig {
  const parsed = TrackingEnvSchema.parse(env);
  return {
    ...d,
    geofenceRadiusMeters: parsed.GEOFENCE_RADIUS_M,
    autoCheckInRadiusMeters: parsed.AUTO_CHECKIN_RADIUS_M,
    routeIntervalMs: parsed.ROUTE_INTERVAL_MS,
    maxHorizontalAccuracyMeters: parsed.MAX_HORIZONTAL_ACCURACY_M,
    etaWindow: { minSeconds: parsed.ETA_WINDOW_MIN_S, maxSeconds: parsed.ETA_WINDOW_MAX_S },
    averageWalkingSpeedMps: parsed.WALKING_SPEED_MPS,
  };
}
