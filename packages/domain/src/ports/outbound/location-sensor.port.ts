import type { LocationPoint, SamplingProfile } from '../../entities/location-point.js';

export type FixListener = (fix: LocationPoint) => void;

export interface LocationSensorPort {
  readonly isRunning: boolean;
  start(profile: SamplingProfile): void;
  reconfigure(profile: SamplingProfile): void;
  /** Halts delivery immediately. */
  stop(): void;
  onFix(listener: FixListener): () => void;
}
