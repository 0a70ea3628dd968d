import type { LocationPoint } from '../../entities/location-point.js';
import type { RegionTransition } from '../outbound/region-monitor.port.js';

export interface FixIngestResult {
  accepted: number;
  /** Dropped for insufficient horizontal accuracy. */
  rejected: number;
}

export interface LocationIngestionPort {
  ingestFixes(visitId: string, fixes: LocationPoint[]): Promise<FixIngestResult>;
  reportRegionEvent(visitId: string, transition: RegionTransition, at: Date): Promise<void>;
}
