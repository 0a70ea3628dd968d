import type { Coordinate } from '../../entities/location-point.js';

export interface CircularRegion {
  id: string;
  center: Coordinate;
  radiusMeters: number;
  /** Last known side of the boundary; a first reading on the other side is a crossing. */
  initiallyInside?: boolean;
}

export type RegionTransition = 'enter' | 'exit';

export type RegionListener = (regionId: string, at: Date) => void;

export interface RegionMonitorPort {
  /** Rejects with RegionMonitoringFailureError when the region cannot be monitored. */
  register(region: CircularRegion): Promise<void>;
  /** Synchronous so that stop/cancel release the region before they resolve. */
  unregister(regionId: string): void;
  onRegionEnter(listener: RegionListener): () => void;
  onRegionExit(listener: RegionListener): () => void;
}
