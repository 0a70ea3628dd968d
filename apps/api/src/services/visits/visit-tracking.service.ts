import {
  DEFAULT_TRACKING_CONFIG,
  GeocodingFailureError,
  InvalidTransitionError,
  routeDistance,
  TrackingNotStartedError,
  VisitNotFoundError,
} from '@field-visit/domain';
import type {
  ClockPort,
  Coordinate,
  EtaEstimate,
  FixIngestResult,
  GeocodingPort,
  LocationIngestionPort,
  LocationPoint,
  NewVisit,
  NotificationDispatcherPort,
  NotificationRequest,
  RegionTransition,
  StartTrigger,
  StreamPublisherPort,
  TrackingConfig,
  VisitRecord,
  VisitRepositoryPort,
  VisitStatus,
  VisitTimerView,
  VisitTrackingPort,
  VisitTransitionPatch,
} from '@field-visit/domain';
import { KeyedSerialQueue } from '../../lib/keyed-serial-queue.js';
import { createLogger, type Logger } from '../../lib/logger.js';
import { FixDrivenRegionMonitor } from '../tracking/fix-driven-region-monitor.js';
import { IngestLocationSensor } from '../tracking/ingest-location-sensor.js';
import { SessionRegistry } from '../tracking/session-registry.js';
import { TrackingSession, type TrackingSessionHooks } from '../tracking/tracking-session.js';
import { computeVisitTimer } from './visit-timer.js';

export interface VisitTrackingServiceDeps {
  visits: VisitRepositoryPort;
  geocoder: GeocodingPort;
  notifier: NotificationDispatcherPort;
  clock: ClockPort;
  publisher?: StreamPublisherPort;
  config?: TrackingConfig;
  /** Region monitor for a new session; one per visit. */
  createRegionMonitor?: () => FixDrivenRegionMonitor;
  logger?: Logger;
}

interface ResolvedDestination {
  destination: Coordinate;
  /** False when it was just geocoded and still has to be written. */
  cached: boolean;
}

/**
 * Sole writer of visit status. Every write for one visit runs through a per-visit queue and
 * status changes are compare-and-set in the store.
 */
export class VisitTrackingService implements VisitTrackingPort, LocationIngestionPort {
  private readonly queue = new KeyedSerialQueue();
  private readonly sessions = new SessionRegistry();
  private readonly config: TrackingConfig;
  private readonly log: Logger;

  constructor(private readonly deps: VisitTrackingServiceDeps) {
    this.config = deps.config ?? DEFAULT_TRACKING_CONFIG;
    this.log = deps.logger ?? createLogger('visit-tracking');
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  async scheduleVisit(input: NewVisit): Promise<VisitRecord> {
    const visit = await this.deps.visits.create(input);
    this.log.info(`scheduled visit ${visit.id} for booking ${visit.bookingId}`);
    this.publish(visit);
    return visit;
  }

  async getVisit(visitId: string): Promise<VisitRecord> {
    return this.requireVisit(visitId);
  }

  beginTracking(visitId: string): Promise<VisitRecord> {
    return this.queue.run(visitId, async () => {
      let visit = await this.requireVisit(visitId);
      if (visit.status !== 'scheduled' && visit.status !== 'active') {
        throw new InvalidTransitionError(visitId, visit.status, 'active');
      }
      const { destination, cached } = await this.resolveDestination(visit);
      if (!cached) visit = await this.deps.visits.update(visitId, { destination });
      await this.ensureSession(visit, destination);
      return visit;
    });
  }

  start(visitId: string, trigger: StartTrigger = { kind: 'manual' }): Promise<VisitRecord> {
    return this.queue.run(visitId, async () => {
      const visit = await this.requireVisit(visitId);
      if (visit.status === 'active') return visit;
      if (visit.status !== 'scheduled') {
        throw new InvalidTransitionError(visitId, visit.status, 'active');
      }

      const { destination, cached } = await this.resolveDestination(visit);
      const actualStart = await this.deps.clock.now();
      const patch: VisitTransitionPatch = {
        status: 'active',
        actualStart,
        ...(cached ? {} : { destination }),
        ...(trigger.kind === 'auto_check_in'
          ? {
              autoCheckedIn: true,
              autoCheckIn: { fix: trigger.fix, distanceMeters: trigger.distanceMeters, triggeredAt: actualStart },
            }
          : {}),
      };

      const updated = await this.deps.visits.transition(visitId, ['scheduled'], patch);
      if (!updated) {
        const current = await this.requireVisit(visitId);
        if (current.status === 'active') return current;
        throw new InvalidTransitionError(visitId, current.status, 'active');
      }

      const session = await this.ensureSession(updated, destination);
      session.update(updated);
      this.log.info(`visit ${visitId} started (${trigger.kind}) at ${actualStart.toISOString()}`);
      this.publish(updated);
      return updated;
    });
  }

  stop(visitId: string): Promise<VisitRecord> {
    return this.queue.run(visitId, async () => {
      const visit = await this.requireVisit(visitId);
      if (visit.status !== 'active') {
        throw new InvalidTransitionError(visitId, visit.status, 'completed');
      }

      const session = this.sessions.get(visitId);
      const totalDistance = session ? session.route.finalize() : routeDistance(visit.routePoints);
      const actualEnd = await this.deps.clock.now();
      const updated = await this.transitionOrThrow(visitId, ['active'], {
        status: 'completed',
        actualEnd,
        totalDistance,
      });

      this.sessions.close(visitId);
      this.log.info(`visit ${visitId} completed, ${totalDistance.toFixed(1)}m travelled`);
      this.publish(updated);
      return updated;
    });
  }

  cancel(visitId: string, reason: string): Promise<VisitRecord> {
    return this.queue.run(visitId, async () => {
      const visit = await this.requireVisit(visitId);
      if (visit.status !== 'scheduled' && visit.status !== 'active') {
        throw new InvalidTransitionError(visitId, visit.status, 'cancelled');
      }

      const cancelledAt = await this.deps.clock.now();
      const updated = await this.transitionOrThrow(visitId, ['scheduled', 'active'], {
        status: 'cancelled',
        cancellationReason: reason,
        cancelledAt,
      });

      this.sessions.close(visitId);
      this.log.info(`visit ${visitId} cancelled: ${reason}`);
      this.publish(updated);
      return updated;
    });
  }

  async getTimer(visitId: string): Promise<VisitTimerView> {
    const visit = await this.requireVisit(visitId);
    return computeVisitTimer(visit, await this.deps.clock.now());
  }

  // ─── Device input ───────────────────────────────────────────────────────────

  async ingestFixes(visitId: string, fixes: LocationPoint[]): Promise<FixIngestResult> {
    const session = await this.requireSession(visitId);
    return session.ingest(fixes);
  }

  async reportRegionEvent(visitId: string, transition: RegionTransition, at: Date): Promise<void> {
    const session = await this.requireSession(visitId);
    session.reportRegionEvent(transition, at);
  }

  /** The live session for a visit, if any. */
  session(visitId: string): TrackingSession | undefined {
    return this.sessions.get(visitId);
  }

  /** Sessions held in memory, including closed ones whose writes are still settling. */
  get retainedSessions(): number {
    return this.sessions.retained;
  }

  /** Resolves once background work triggered by fixes has settled. */
  async whenIdle(): Promise<void> {
    await this.sessions.idle();
  }

  shutdown(): void {
    this.sessions.closeAll();
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private async requireVisit(visitId: string): Promise<VisitRecord> {
    const visit = await this.deps.visits.findById(visitId);
    if (!visit) throw new VisitNotFoundError(visitId);
    return visit;
  }

  private async requireSession(visitId: string): Promise<TrackingSession> {
    const session = this.sessions.get(visitId);
    if (session) return session;
    await this.requireVisit(visitId);
    throw new TrackingNotStartedError(visitId);
  }

  private async transitionOrThrow(
    visitId: string,
    from: readonly VisitStatus[],
    patch: VisitTransitionPatch,
  ): Promise<VisitRecord> {
    const updated = await this.deps.visits.transition(visitId, from, patch);
    if (updated) return updated;
    const current = await this.requireVisit(visitId);
    throw new InvalidTransitionError(visitId, current.status, patch.status);
  }

  /** Geocodes only when the record has no cached destination. Writes nothing. */
  private async resolveDestination(visit: VisitRecord): Promise<ResolvedDestination> {
    if (visit.destination) return { destination: visit.destination, cached: true };
    let destination: Coordinate | null;
    try {
      destination = await this.deps.geocoder.resolveAddress(visit.address);
    } catch (err) {
      throw new GeocodingFailureError(visit.id, visit.address, err);
    }
    if (!destination) throw new GeocodingFailureError(visit.id, visit.address);
    return { destination, cached: false };
  }

  private async ensureSession(visit: VisitRecord, destination: Coordinate): Promise<TrackingSession> {
    const existing = this.sessions.get(visit.id);
    if (existing) return existing;
    const session = new TrackingSession({
      visit,
      destination,
      config: this.config,
      sensor: new IngestLocationSensor(),
      regions: this.deps.createRegionMonitor?.() ?? new FixDrivenRegionMonitor(),
      hooks: this.hooksFor(visit.id),
      logger: this.deps.logger ?? createLogger(`session:${visit.id}`),
    });
    return this.sessions.open(session);
  }

  private hooksFor(visitId: string): TrackingSessionHooks {
    return {
      startFromCheckIn: (fix, distanceMeters) =>
        this.start(visitId, { kind: 'auto_check_in', fix, distanceMeters }),

      onCheckedIn: (visit) =>
        this.notify({
          userId: visit.clientId,
          title: 'Visit started',
          body: `${visit.workerName ?? 'Your service provider'} has arrived and started the visit.`,
          metadata: { type: 'visit_started', visitId: visit.id, bookingId: visit.bookingId },
        }),

      persistGeofence: (state) =>
        this.queue.run(visitId, async () => {
          const session = this.sessions.get(visitId);
          if (!session) return;
          const updated = await this.deps.visits.update(visitId, { geofence: state });
          session.update(updated);
          this.publish(updated);
        }),

      persistRoutePoint: (fix) =>
        this.queue.run(visitId, async () => {
          const session = this.sessions.get(visitId);
          if (!session) return;
          const updated = await this.deps.visits.appendRoutePoint(visitId, fix, session.route.distanceWith(fix));
          if (!updated) return;
          session.route.add(fix);
          session.update(updated);
        }),

      onArrivingSoon: (estimate) => this.recordArrivingSoon(visitId, estimate),

      publishEta: (estimate) => {
        this.deps.publisher?.publishEta(estimate).catch((err: unknown) => {
          this.log.warn(`eta publish failed for ${visitId}`, err);
        });
      },

      publishSamplingMode: (profile) => {
        this.deps.publisher?.publishSamplingMode(visitId, profile).catch((err: unknown) => {
          this.log.warn(`sampling mode publish failed for ${visitId}`, err);
        });
      },
    };
  }

  private async recordArrivingSoon(visitId: string, estimate: EtaEstimate): Promise<void> {
    const session = this.sessions.get(visitId);
    if (!session) return;
    const visit = session.visit;
    const minutes = Math.max(1, Math.round(estimate.etaSeconds / 60));
    this.notify({
      userId: visit.clientId,
      title: 'Arriving soon',
      body: `${visit.workerName ?? 'Your service provider'} is about ${minutes} minutes away.`,
      metadata: { type: 'arriving_soon', visitId, bookingId: visit.bookingId },
    });

    await this.queue.run(visitId, async () => {
      const sentAt = await this.deps.clock.now();
      const updated = await this.deps.visits.update(visitId, {
        etaNotificationSent: true,
        etaNotification: {
          distanceMeters: estimate.distanceMeters,
          etaSeconds: estimate.etaSeconds,
          sentAt,
        },
      });
      this.sessions.get(visitId)?.update(updated);
    });
  }

  private notify(request: NotificationRequest): void {
    this.deps.notifier.dispatch(request).catch((err: unknown) => {
      this.log.warn(`notification ${request.metadata.type} to ${request.userId} failed`, err);
    });
  }

  private publish(visit: VisitRecord): void {
    this.deps.publisher?.publishVisit(visit).catch((err: unknown) => {
      this.log.warn(`visit publish failed for ${visit.id}`, err);
    });
  }
}
