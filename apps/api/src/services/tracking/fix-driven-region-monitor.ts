import { haversineDistance, RegionMonitoringFailureError } from '@field-visit/domain';
import type {
  CircularRegion,
  Coordinate,
  RegionListener,
  RegionMonitorPort,
  RegionTransition,
} from '@field-visit/domain';

interface MonitoredRegion {
  region: CircularRegion;
  /** null until the first fix or device report decides it. */
  inside: boolean | null;
}

/**
 * Region monitoring evaluated on the server. Boundary crossings are derived from fixes
 * (inside means distance <= radius) or taken from device reports; listeners fire only on a change.
 */
export class FixDrivenRegionMonitor implements RegionMonitorPort {
  private readonly regions = new Map<string, MonitoredRegion>();
  private readonly enterListeners = new Set<RegionListener>();
  private readonly exitListeners = new Set<RegionListener>();

  constructor(private readonly maxRegions = 20) {}

  async register(region: CircularRegion): Promise<void> {
    if (!Number.isFinite(region.radiusMeters) || region.radiusMeters <= 0) {
      throw new RegionMonitoringFailureError(region.id, `invalid radius ${region.radiusMeters}`);
    }
    if (!isValidCoordinate(region.center)) {
      throw new RegionMonitoringFailureError(region.id, 'invalid center');
    }
    if (!this.regions.has(region.id) && this.regions.size >= this.maxRegions) {
      throw new RegionMonitoringFailureError(region.id, `limit of ${this.maxRegions} regions reached`);
    }
    this.regions.set(region.id, { region, inside: region.initiallyInside ?? null });
  }

  unregister(regionId: string): void {
    this.regions.delete(regionId);
  }

  isMonitoring(regionId: string): boolean {
    return this.regions.has(regionId);
  }

  onRegionEnter(listener: RegionListener): () => void {
    this.enterListeners.add(listener);
    return () => {
      this.enterListeners.delete(listener);
    };
  }

  onRegionExit(listener: RegionListener): () => void {
    this.exitListeners.add(listener);
    return () => {
      this.exitListeners.delete(listener);
    };
  }

  /** Evaluates every region against an accuracy-valid position. */
  observe(position: Coordinate, at: Date): void {
    for (const monitored of [...this.regions.values()]) {
      const inside = haversineDistance(position, monitored.region.center) <= monitored.region.radiusMeters;
      this.apply(monitored, inside, at);
    }
  }

  /** A crossing reported by the device itself. */
  report(regionId: string, transition: RegionTransition, at: Date): void {
    const monitored = this.regions.get(regionId);
    if (!monitored) return;
    this.apply(monitored, transition === 'enter', at);
  }

  private apply(monitored: MonitoredRegion, inside: boolean, at: Date): void {
    const previous = monitored.inside;
    monitored.inside = inside;
    if (previous === inside) return;
    // An initial outside determination is not a crossing.
    if (previous === null && !inside) return;
    const listeners = inside ? this.enterListeners : this.exitListeners;
    for (const listener of [...listeners]) listener(monitored.region.id, at);
  }
}

function isValidCoordinate(c: Coordinate): boolean {
  return (
    Number.isFinite(c.latitude) &&
    Number.isFinite(c.longitude) &&
    Math.abs(c.latitude) <= 90 &&
    Math.abs(c.longitude) <= 180
  );
}
