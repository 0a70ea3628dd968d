import { haversineDistance, InvalidTransitionError } from '@field-visit/domain';
import type { Coordinate, LocationPoint, VisitRecord } from '@field-visit/domain';
import type { Logger } from '../../lib/logger.js';

export type AutoCheckInOutcome =
  | 'checked_in'
  | 'out_of_range'
  | 'ineligible'
  | 'in_flight'
  | 'disabled'
  | 'failed';

export interface AutoCheckInDeps {
  /** True while the visit is scheduled, not yet auto-checked-in and the geofence is healthy. */
  isEligible: () => boolean;
  start: (fix: LocationPoint, distanceMeters: number) => Promise<VisitRecord>;
  onCheckedIn: (visit: VisitRecord) => void;
  logger: Logger;
}

/** Starts the visit once, on the first valid fix within the check-in radius. */
export class AutoCheckInEngine {
  private inFlight = false;
  private done = false;

  constructor(
    private readonly visitId: string,
    private readonly destination: Coordinate,
    private readonly radiusMeters: number,
    private readonly deps: AutoCheckInDeps,
  ) {}

  get isDone(): boolean {
    return this.done;
  }

  async evaluate(fix: LocationPoint): Promise<AutoCheckInOutcome> {
    if (this.done) return 'disabled';
    if (this.inFlight) return 'in_flight';
    if (!this.deps.isEligible()) return 'ineligible';

    const distance = haversineDistance(fix, this.destination);
    if (distance > this.radiusMeters) return 'out_of_range';

    this.inFlight = true;
    try {
      const visit = await this.deps.start(fix, distance);
      this.done = true;
      // Someone else started it first.
      if (!visit.autoCheckedIn) return 'disabled';
      this.deps.logger.info(`visit ${this.visitId} auto-checked-in at ${distance.toFixed(1)}m`);
      this.deps.onCheckedIn(visit);
      return 'checked_in';
    } catch (err) {
      if (err instanceof InvalidTransitionError) {
        this.done = true;
        this.deps.logger.warn(`auto check-in disabled for ${this.visitId}: ${err.message}`);
        return 'disabled';
      }
      this.deps.logger.error(`auto check-in failed for ${this.visitId}; next fix retries`, err);
      return 'failed';
    } finally {
      this.inFlight = false;
    }
  }
}
