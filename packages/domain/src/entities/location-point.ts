export interface Coordinate {
  readonly latitude: number;
  readonly longitude: number;
}

/** Immutable position sample as reported by the worker's device. */
export interface LocationPoint extends Coordinate {
  readonly altitude: number;
  /** Radius of uncertainty in meters; negative means the fix has no valid position. */
  readonly horizontalAccuracy: number;
  /** Meters per second; negative when the device could not determine it. */
  readonly speed: number;
  /** Degrees clockwise from true north; negative when unknown. */
  readonly course: number;
  readonly timestamp: Date;
}

export type SamplingMode = 'battery_efficient' | 'high_accuracy';

export interface SamplingProfile {
  readonly mode: SamplingMode;
  readonly desiredAccuracyMeters: number;
  readonly distanceFilterMeters: number;
}
