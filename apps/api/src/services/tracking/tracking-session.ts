import type {
  Coordinate,
  EtaEstimate,
  FixIngestResult,
  GeofenceState,
  LocationPoint,
  RegionTransition,
  SamplingProfile,
  TrackingConfig,
  VisitRecord,
} from '@field-visit/domain';
import type { Logger } from '../../lib/logger.js';
import { AutoCheckInEngine } from './auto-check-in.engine.js';
import { EtaEstimator } from './eta-estimator.js';
import type { FixDrivenRegionMonitor } from './fix-driven-region-monitor.js';
import { GeofenceMonitor } from './geofence-monitor.js';
import type { IngestLocationSensor } from './ingest-location-sensor.js';
import { LocationSampler } from './location-sampler.js';
import { RouteTracker } from './route-tracker.js';

/** What a session asks of the service that owns the visit record. */
export interface TrackingSessionHooks {
  startFromCheckIn(fix: LocationPoint, distanceMeters: number): Promise<VisitRecord>;
  onCheckedIn(visit: VisitRecord): void;
  persistGeofence(state: GeofenceState): Promise<void>;
  persistRoutePoint(fix: LocationPoint): Promise<void>;
  onArrivingSoon(estimate: EtaEstimate): Promise<void>;
  publishEta(estimate: EtaEstimate): void;
  publishSamplingMode(profile: SamplingProfile): void;
}

export interface TrackingSessionOptions {
  visit: VisitRecord;
  destination: Coordinate;
  config: TrackingConfig;
  sensor: IngestLocationSensor;
  regions: FixDrivenRegionMonitor;
  hooks: TrackingSessionHooks;
  logger: Logger;
}

/**
 * Everything that watches one visit's device: sampler, geofence, auto check-in, ETA and route.
 * Owns no persistence; writes go back to the service through the hooks.
 */
export class TrackingSession {
  readonly visitId: string;
  readonly destination: Coordinate;
  readonly sampler: LocationSampler;
  readonly geofence: GeofenceMonitor;
  readonly autoCheckIn: AutoCheckInEngine;
  readonly eta: EtaEstimator;
  readonly route: RouteTracker;

  private snapshot: VisitRecord;
  private closed = false;
  private readonly pending = new Set<Promise<void>>();
  private readonly unsubscribers: Array<() => void> = [];
  private readonly sensor: IngestLocationSensor;
  private readonly regions: FixDrivenRegionMonitor;
  private readonly hooks: TrackingSessionHooks;
  private readonly logger: Logger;

  constructor(opts: TrackingSessionOptions) {
    const { visit, destination, config, hooks, logger } = opts;
    this.visitId = visit.id;
    this.destination = destination;
    this.snapshot = visit;
    this.sensor = opts.sensor;
    this.regions = opts.regions;
    this.hooks = hooks;
    this.logger = logger;

    this.sampler = new LocationSampler(this.sensor, config);
    this.route = new RouteTracker(visit.routePoints);
    this.geofence = new GeofenceMonitor(visit.id, destination, config.geofenceRadiusMeters, visit.geofence, {
      regions: this.regions,
      sampler: this.sampler,
      persist: (state) => this.track(hooks.persistGeofence(state), 'geofence state'),
      logger,
    });
    this.autoCheckIn = new AutoCheckInEngine(visit.id, destination, config.autoCheckInRadiusMeters, {
      isEligible: () =>
        !this.closed &&
        this.snapshot.status === 'scheduled' &&
        !this.snapshot.autoCheckedIn &&
        !this.geofence.isDegraded,
      start: (fix, distance) => hooks.startFromCheckIn(fix, distance),
      onCheckedIn: (checkedIn) => {
        this.sampler.setMode('battery_efficient');
        hooks.onCheckedIn(checkedIn);
      },
      logger,
    });
    this.eta = new EtaEstimator(visit.id, destination, config, {
      isEligible: () => !this.closed && this.snapshot.status === 'scheduled',
      alreadyNotified: () => this.snapshot.etaNotificationSent,
      onArrivingSoon: (estimate) => this.track(hooks.onArrivingSoon(estimate), 'arriving-soon notice'),
    });
  }

  get visit(): VisitRecord {
    return this.snapshot;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async open(): Promise<void> {
    this.unsubscribers.push(
      this.sampler.onModeChange((profile) => this.hooks.publishSamplingMode(profile)),
      this.sampler.onFix((fix) => this.handleFix(fix)),
      this.sampler.onRouteFix((fix) => this.track(this.hooks.persistRoutePoint(fix), 'route point')),
      this.eta.onEstimate((estimate) => this.hooks.publishEta(estimate)),
    );
    this.sampler.start(this.snapshot.geofence.isInside ? 'high_accuracy' : 'battery_efficient');
    await this.geofence.start();
    this.update(this.snapshot);
    this.logger.info(
      `session opened for ${this.visitId} (${this.snapshot.status}${this.geofence.isDegraded ? ', degraded' : ''})`,
    );
  }

  /** Adopts a newer record; older revisions are ignored. */
  update(visit: VisitRecord): void {
    if (visit.revision < this.snapshot.revision) return;
    this.snapshot = visit;
    if (visit.status === 'active' && !this.closed) this.sampler.enableRouteSampling();
  }

  ingest(fixes: readonly LocationPoint[]): FixIngestResult {
    const before = this.sampler.stats;
    for (const fix of fixes) this.sensor.push(fix);
    const after = this.sampler.stats;
    return { accepted: after.accepted - before.accepted, rejected: after.rejected - before.rejected };
  }

  reportRegionEvent(transition: RegionTransition, at: Date): void {
    this.regions.report(this.geofence.regionId, transition, at);
  }

  /** Halts the sampler and releases the region before returning. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const unsubscribe of this.unsubscribers.splice(0)) unsubscribe();
    this.sampler.stop();
    this.geofence.stop();
    this.logger.info(`session closed for ${this.visitId}`);
  }

  /** Resolves when background work started by fixes has settled. */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private handleFix(fix: LocationPoint): void {
    if (this.closed) return;
    this.regions.observe(fix, fix.timestamp);
    this.eta.evaluate(fix);
    this.track(this.autoCheckIn.evaluate(fix), 'auto check-in');
  }

  private track(work: Promise<unknown>, label: string): Promise<void> {
    const settled: Promise<void> = work
      .then(() => undefined)
      .catch((err: unknown) => {
        this.logger.error(`${label} failed for ${this.visitId}`, err);
      })
      .finally(() => {
        this.pending.delete(settled);
      });
    this.pending.add(settled);
    return settled;
  }
}
