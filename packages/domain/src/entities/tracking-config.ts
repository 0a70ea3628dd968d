import type { SamplingMode, SamplingProfile } from './location-point.js';

export interface TrackingConfig {
  readonly geofenceRadiusMeters: number;
  readonly autoCheckInRadiusMeters: number;
  readonly routeIntervalMs: number;
  /** Fixes with a larger horizontal accuracy are dropped. */
  readonly maxHorizontalAccuracyMeters: number;
  /** ETA notification fires when minSeconds < eta <= maxSeconds. */
  readonly etaWindow: { readonly minSeconds: number; readonly maxSeconds: number };
  readonly averageWalkingSpeedMps: number;
  readonly samplingProfiles: Readonly<Record<SamplingMode, SamplingProfile>>;
}

export const DEFAULT_TRACKING_CONFIG: TrackingConfig = {
  geofenceRadiusMeters: 200,
  autoCheckInRadiusMeters: 100,
  routeIntervalMs: 30_000,
  maxHorizontalAccuracyMeters: 50,
  etaWindow: { minSeconds: 240, maxSeconds: 300 },
  averageWalkingSpeedMps: 1.4,
  samplingProfiles: {
    battery_efficient: {
      mode: 'battery_efficient',
      desiredAccuracyMeters: 100,
      distanceFilterMeters: 50,
    },
    high_accuracy: {
      mode: 'high_accuracy',
      desiredAccuracyMeters: 5,
      distanceFilterMeters: 10,
    },
  },
};
