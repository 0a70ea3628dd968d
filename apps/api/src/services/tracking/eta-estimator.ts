import type { Coordinate, EtaEstimate, LocationPoint, TrackingConfig } from '@field-visit/domain';
import { haversineDistance } from '@field-visit/domain';

export type EtaListener = (estimate: EtaEstimate) => void;

export interface EtaEstimatorDeps {
  /** True while the visit is scheduled. */
  isEligible: () => boolean;
  /** Persisted flag; the estimator also remembers in memory. */
  alreadyNotified: () => boolean;
  /** Called at most once, the first time an estimate falls in the window. */
  onArrivingSoon: (estimate: EtaEstimate) => void;
}

type EtaConfig = Pick<TrackingConfig, 'averageWalkingSpeedMps' | 'etaWindow'>;

export class EtaEstimator {
  private current: EtaEstimate | null = null;
  private notified = false;
  private readonly listeners = new Set<EtaListener>();

  constructor(
    private readonly visitId: string,
    private readonly destination: Coordinate,
    private readonly config: EtaConfig,
    private readonly deps: EtaEstimatorDeps,
  ) {}

  get latest(): EtaEstimate | null {
    return this.current;
  }

  onEstimate(listener: EtaListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  inWindow(etaSeconds: number): boolean {
    const { minSeconds, maxSeconds } = this.config.etaWindow;
    return etaSeconds > minSeconds && etaSeconds <= maxSeconds;
  }

  evaluate(fix: LocationPoint): EtaEstimate | null {
    if (!this.deps.isEligible()) return null;

    const distanceMeters = haversineDistance(fix, this.destination);
    const estimate: EtaEstimate = {
      visitId: this.visitId,
      distanceMeters,
      etaSeconds: distanceMeters / this.config.averageWalkingSpeedMps,
      at: fix.timestamp,
    };
    this.current = estimate;
    for (const listener of [...this.listeners]) listener(estimate);

    if (!this.notified && !this.deps.alreadyNotified() && this.inWindow(estimate.etaSeconds)) {
      this.notified = true;
      this.deps.onArrivingSoon(estimate);
    }
    return estimate;
  }
}
