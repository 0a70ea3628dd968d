import type { Coordinate, GeofenceState, RegionMonitorPort } from '@field-visit/domain';
import type { Logger } from '../../lib/logger.js';
import type { LocationSampler } from './location-sampler.js';

export interface GeofenceMonitorDeps {
  regions: RegionMonitorPort;
  sampler: LocationSampler;
  /** Persists the new state; failures are logged by the monitor. */
  persist: (state: GeofenceState) => Promise<void>;
  logger: Logger;
}

/**
 * Watches one circular region around the visit destination. Entering switches the sampler to high
 * accuracy and leaving switches it back. When the region cannot be registered the monitor is degraded.
 */
export class GeofenceMonitor {
  readonly regionId: string;
  private current: GeofenceState;
  private degradedReason: string | null = null;
  private registered = false;
  private readonly unsubscribers: Array<() => void> = [];

  constructor(
    visitId: string,
    private readonly center: Coordinate,
    private readonly radiusMeters: number,
    initial: GeofenceState,
    private readonly deps: GeofenceMonitorDeps,
  ) {
    this.regionId = `visit:${visitId}`;
    this.current = initial;
  }

  get state(): GeofenceState {
    return this.current;
  }

  get isDegraded(): boolean {
    return this.degradedReason !== null;
  }

  /** Never rejects: registration failure leaves the monitor degraded. */
  async start(): Promise<void> {
    this.unsubscribers.push(
      this.deps.regions.onRegionEnter((regionId, at) => {
        if (regionId === this.regionId) this.handleEnter(at);
      }),
      this.deps.regions.onRegionExit((regionId, at) => {
        if (regionId === this.regionId) this.handleExit(at);
      }),
    );
    try {
      await this.deps.regions.register({
        id: this.regionId,
        center: this.center,
        radiusMeters: this.radiusMeters,
        initiallyInside: this.current.isInside,
      });
      this.registered = true;
    } catch (err) {
      this.degradedReason = err instanceof Error ? err.message : String(err);
      this.deps.logger.error(`geofence ${this.regionId} degraded`, err);
    }
  }

  stop(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) unsubscribe();
    if (this.registered) {
      this.deps.regions.unregister(this.regionId);
      this.registered = false;
    }
  }

  private handleEnter(at: Date): void {
    if (this.isDegraded || this.current.isInside) return;
    this.current = { isInside: true, enteredAt: at, exitedAt: this.current.exitedAt };
    this.deps.sampler.setMode('high_accuracy');
    this.save();
  }

  private handleExit(at: Date): void {
    if (this.isDegraded || !this.current.isInside) return;
    this.current = { isInside: false, enteredAt: this.current.enteredAt, exitedAt: at };
    this.deps.sampler.setMode('battery_efficient');
    this.save();
  }

  private save(): void {
    const state = this.current;
    this.deps.persist(state).catch((err: unknown) => {
      this.deps.logger.error(`failed to persist geofence state for ${this.regionId}`, err);
    });
  }
}
