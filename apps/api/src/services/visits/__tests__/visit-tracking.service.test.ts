import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { createInMemoryRecordStore, DeterministicClock } from '@field-visit/adapters';
import type { InMemoryRecordStore } from '@field-visit/adapters';
import {
  GeocodingFailureError,
  InvalidTransitionError,
  TrackingNotStartedError,
  VisitNotFoundError,
} from '@field-visit/domain';
import type { VisitRecord } from '@field-visit/domain';
import { FixDrivenRegionMonitor } from '../../tracking/fix-driven-region-monitor.js';
import { VisitTrackingService, type VisitTrackingServiceDeps } from '../visit-tracking.service.js';
import {
  DEST,
  fixAt,
  RecordingNotifier,
  RecordingPublisher,
  silentLogger,
  StaticGeocoder,
  T0,
} from '../../../__tests__/helpers.js';

const STARTED_AT = new Date('2026-03-02T09:55:00Z');

describe('VisitTrackingService', () => {
  let store: InMemoryRecordStore;
  let clock: DeterministicClock;
  let geocoder: StaticGeocoder;
  let notifier: RecordingNotifier;
  let publisher: RecordingPublisher;
  let service: VisitTrackingService;

  const build = (overrides: Partial<VisitTrackingServiceDeps> = {}): VisitTrackingService =>
    new VisitTrackingService({
      visits: store.visits,
      geocoder,
      notifier,
      clock,
      publisher,
      logger: silentLogger,
      ...overrides,
    });

  const schedule = (): Promise<VisitRecord> =>
    service.scheduleVisit({
      id: 'v-1',
      bookingId: 'b-1',
      workerId: 'w-1',
      clientId: 'c-1',
      workerName: 'Sam',
      address: '1 Test Street',
      scheduledStart: new Date('2026-03-02T10:00:00Z'),
      scheduledEnd: new Date('2026-03-02T11:00:00Z'),
    });

  const stored = async (): Promise<VisitRecord> => {
    const visit = await store.visits.findById('v-1');
    if (!visit) throw new Error('visit v-1 missing from store');
    return visit;
  };

  beforeEach(() => {
    store = createInMemoryRecordStore(() => new Date(T0));
    clock = new DeterministicClock(STARTED_AT.getTime());
    geocoder = new StaticGeocoder();
    notifier = new RecordingNotifier();
    publisher = new RecordingPublisher();
    service = build();
  });

  afterEach(() => {
    service.shutdown();
  });

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  describe('scheduling', () => {
    it('creates a scheduled visit and publishes it', async () => {
      const visit = await schedule();
      expect(visit).toMatchObject({ id: 'v-1', status: 'scheduled', revision: 1, destination: null });
      expect(publisher.visits.map((v) => v.id)).toEqual(['v-1']);
      await expect(service.getVisit('v-1')).resolves.toEqual(visit);
    });

    it('reports an unknown visit', async () => {
      await expect(service.getVisit('nope')).rejects.toBeInstanceOf(VisitNotFoundError);
    });
  });

  describe('beginTracking', () => {
    it('geocodes once and caches the destination', async () => {
      await schedule();
      const visit = await service.beginTracking('v-1');
      expect(visit.destination).toEqual(DEST);
      expect(visit.status).toBe('scheduled');
      expect(service.session('v-1')?.visit.status).toBe('scheduled');

      await service.start('v-1');
      expect(geocoder.resolveAddress).toHaveBeenCalledTimes(1);
      expect(geocoder.resolveAddress).toHaveBeenCalledWith('1 Test Street');
    });

    it('writes nothing when the address cannot be resolved', async () => {
      geocoder = new StaticGeocoder(null);
      service = build();
      await schedule();
      await expect(service.beginTracking('v-1')).rejects.toBeInstanceOf(GeocodingFailureError);
      await expect(service.start('v-1')).rejects.toBeInstanceOf(GeocodingFailureError);
      const visit = await stored();
      expect(visit).toMatchObject({ status: 'scheduled', revision: 1, destination: null, actualStart: null });
      expect(service.session('v-1')).toBeUndefined();
    });

    it('wraps a geocoder error', async () => {
      geocoder = new StaticGeocoder(new Error('geocoder offline'));
      service = build();
      await schedule();
      await expect(service.beginTracking('v-1')).rejects.toMatchObject({
        code: 'GEOCODING_FAILURE',
      });
    });

    it('refuses a finished visit', async () => {
      await schedule();
      await service.cancel('v-1', 'client unavailable');
      await expect(service.beginTracking('v-1')).rejects.toBeInstanceOf(InvalidTransitionError);
    });
  });

  describe('start', () => {
    it('activates with the trusted clock time', async () => {
      await schedule();
      const visit = await service.start('v-1');
      expect(visit).toMatchObject({
        status: 'active',
        actualStart: STARTED_AT,
        autoCheckedIn: false,
        destination: DEST,
        revision: 2,
      });
      expect(service.session('v-1')?.sampler.isRouteSampling).toBe(true);
    });

    it('is idempotent, also when called concurrently', async () => {
      await schedule();
      const [a, b] = await Promise.all([service.start('v-1'), service.start('v-1')]);
      expect(a.revision).toBe(2);
      expect(b.revision).toBe(2);
      clock.advance(60_000);
      const again = await service.start('v-1');
      expect(again.actualStart).toEqual(STARTED_AT);
      expect((await stored()).revision).toBe(2);
    });

    it('rejects a cancelled visit', async () => {
      await schedule();
      await service.cancel('v-1', 'weather');
      await expect(service.start('v-1')).rejects.toMatchObject({ code: 'INVALID_TRANSITION' });
    });
  });

  describe('stop', () => {
    it('requires an active visit', async () => {
      await schedule();
      await expect(service.stop('v-1')).rejects.toBeInstanceOf(InvalidTransitionError);
    });

    it('completes the visit with the route distance and closes the session', async () => {
      await schedule();
      await service.start('v-1');
      const session = service.session('v-1');

      await service.ingestFixes('v-1', [fixAt(300, 0), fixAt(200, 30), fixAt(150, 60)]);
      await service.whenIdle();
      expect((await stored()).routePoints).toHaveLength(3);

      clock.set(new Date('2026-03-02T10:50:00Z'));
      const visit = await service.stop('v-1');
      expect(visit.status).toBe('completed');
      expect(visit.actualEnd).toEqual(new Date('2026-03-02T10:50:00Z'));
      expect(visit.totalDistance).toBeCloseTo(150, 3);
      expect(session?.isClosed).toBe(true);
      expect(service.session('v-1')).toBeUndefined();
      await expect(service.cancel('v-1', 'late')).rejects.toBeInstanceOf(InvalidTransitionError);
    });
  });

  describe('session lifetime', () => {
    it('releases closed sessions without waiting on whenIdle', async () => {
      for (let i = 0; i < 50; i++) {
        const id = `v-${i}`;
        await service.scheduleVisit({
          id,
          bookingId: `b-${i}`,
          workerId: 'w-1',
          clientId: 'c-1',
          address: '1 Test Street',
          scheduledStart: new Date('2026-03-02T10:00:00Z'),
          scheduledEnd: new Date('2026-03-02T11:00:00Z'),
        });
        await service.start(id);
        await service.ingestFixes(id, [fixAt(300, 0), fixAt(200, 30)]);
        await service.stop(id);
      }
      await new Promise((resolve) => setImmediate(resolve));
      expect(service.retainedSessions).toBe(0);
    });
  });

  describe('cancel', () => {
    it('keeps the start time and halts tracking before resolving', async () => {
      await schedule();
      await service.start('v-1');
      const session = service.session('v-1');
      clock.set(new Date('2026-03-02T10:10:00Z'));

      const visit = await service.cancel('v-1', 'client unavailable');
      expect(visit).toMatchObject({
        status: 'cancelled',
        actualStart: STARTED_AT,
        cancellationReason: 'client unavailable',
        cancelledAt: new Date('2026-03-02T10:10:00Z'),
      });
      expect(session?.isClosed).toBe(true);
      expect(session?.sampler.isRunning).toBe(false);
      await expect(service.ingestFixes('v-1', [fixAt(10, 0)])).rejects.toBeInstanceOf(TrackingNotStartedError);
    });
  });

  describe('device input', () => {
    it('needs a started session', async () => {
      await schedule();
      await expect(service.ingestFixes('v-1', [fixAt(10, 0)])).rejects.toBeInstanceOf(TrackingNotStartedError);
      await expect(service.reportRegionEvent('nope', 'enter', new Date(T0))).rejects.toBeInstanceOf(
        VisitNotFoundError,
      );
    });

    it('switches to high accuracy on a device-reported entry', async () => {
      await schedule();
      await service.beginTracking('v-1');
      await service.reportRegionEvent('v-1', 'enter', new Date(T0));
      await service.whenIdle();
      expect(service.session('v-1')?.sampler.mode).toBe('high_accuracy');
      expect((await stored()).geofence).toEqual({ isInside: true, enteredAt: new Date(T0), exitedAt: null });
    });
  });

  describe('getTimer', () => {
    it('reports elapsed and remaining time from the trusted clock', async () => {
      await schedule();
      await service.start('v-1');
      clock.set(new Date('2026-03-02T10:30:00Z'));
      const timer = await service.getTimer('v-1');
      expect(timer).toMatchObject({ elapsedLabel: '35:00', remainingLabel: '30:00', startDeviation: '5m early' });
    });
  });

  // ─── Field scenarios ────────────────────────────────────────────────────────

  describe('approach and auto check-in', () => {
    it('enters the geofence at 180 m and checks in once at 95 m', async () => {
      await schedule();
      await service.beginTracking('v-1');
      const session = service.session('v-1');

      await service.ingestFixes('v-1', [fixAt(250, 0)]);
      expect(session?.geofence.state.isInside).toBe(false);
      expect(session?.sampler.mode).toBe('battery_efficient');

      await service.ingestFixes('v-1', [fixAt(180, 30)]);
      expect(session?.geofence.state.isInside).toBe(true);
      expect(session?.sampler.mode).toBe('high_accuracy');
      await service.whenIdle();
      expect((await stored()).geofence.isInside).toBe(true);

      await service.ingestFixes('v-1', [fixAt(95, 60)]);
      await service.whenIdle();
      const visit = await stored();
      expect(visit.status).toBe('active');
      expect(visit.autoCheckedIn).toBe(true);
      expect(visit.actualStart).toEqual(STARTED_AT);
      expect(visit.autoCheckIn?.distanceMeters).toBeCloseTo(95, 3);
      expect(visit.autoCheckIn?.fix.timestamp).toEqual(new Date(T0 + 60_000));
      expect(session?.sampler.mode).toBe('battery_efficient');

      await service.ingestFixes('v-1', [fixAt(40, 70), fixAt(20, 80)]);
      await service.whenIdle();
      expect(notifier.ofType('visit_started')).toHaveLength(1);
      expect(notifier.ofType('visit_started')[0]).toMatchObject({
        userId: 'c-1',
        body: 'Sam has arrived and started the visit.',
      });
    });

    it('records the exit after a restart inside the geofence', async () => {
      await schedule();
      await service.beginTracking('v-1');
      await service.ingestFixes('v-1', [fixAt(150, 0)]);
      await service.whenIdle();
      expect((await stored()).geofence.isInside).toBe(true);
      service.shutdown();

      const restarted = build();
      await restarted.beginTracking('v-1');
      expect(restarted.session('v-1')?.sampler.mode).toBe('high_accuracy');
      await restarted.ingestFixes('v-1', [fixAt(600, 30), fixAt(650, 40)]);
      await restarted.whenIdle();

      expect((await stored()).geofence).toEqual({
        isInside: false,
        enteredAt: new Date(T0),
        exitedAt: new Date(T0 + 30_000),
      });
      expect(restarted.session('v-1')?.sampler.mode).toBe('battery_efficient');
      restarted.shutdown();
    });

    it('does not check in while the geofence is degraded', async () => {
      service = build({ createRegionMonitor: () => new FixDrivenRegionMonitor(0) });
      await schedule();
      await service.beginTracking('v-1');
      expect(service.session('v-1')?.geofence.isDegraded).toBe(true);

      await service.ingestFixes('v-1', [fixAt(50, 0)]);
      await service.whenIdle();
      expect((await stored()).status).toBe('scheduled');
      expect(service.session('v-1')?.sampler.mode).toBe('battery_efficient');

      await expect(service.start('v-1')).resolves.toMatchObject({ status: 'active', autoCheckedIn: false });
    });

    it('leaves a manually started visit alone', async () => {
      await schedule();
      await service.start('v-1');
      await service.ingestFixes('v-1', [fixAt(50, 0)]);
      await service.whenIdle();
      expect((await stored()).autoCheckedIn).toBe(false);
      expect(notifier.ofType('visit_started')).toEqual([]);
    });
  });

  describe('arriving soon', () => {
    it('notifies once at 350 m and persists the flag', async () => {
      await schedule();
      await service.beginTracking('v-1');

      await service.ingestFixes('v-1', [fixAt(350, 0)]);
      await service.ingestFixes('v-1', [fixAt(350, 10)]);
      await service.whenIdle();

      const notices = notifier.ofType('arriving_soon');
      expect(notices).toHaveLength(1);
      expect(notices[0]?.body).toBe('Sam is about 4 minutes away.');
      const visit = await stored();
      expect(visit.etaNotificationSent).toBe(true);
      expect(visit.etaNotification?.etaSeconds).toBeCloseTo(250, 1);
      expect(visit.etaNotification?.sentAt).toEqual(STARTED_AT);
      expect(publisher.etas).toHaveLength(2);
    });

    it('does not notify again after a restart', async () => {
      await schedule();
      await service.beginTracking('v-1');
      await service.ingestFixes('v-1', [fixAt(350, 0)]);
      await service.whenIdle();
      service.shutdown();

      const restarted = build();
      await restarted.beginTracking('v-1');
      await restarted.ingestFixes('v-1', [fixAt(340, 20)]);
      await restarted.whenIdle();
      restarted.shutdown();
      expect(notifier.ofType('arriving_soon')).toHaveLength(1);
    });
  });

  describe('inaccurate fixes', () => {
    it('drops a 75 m fix without touching the visit', async () => {
      await schedule();
      await service.beginTracking('v-1');
      const before = await stored();

      const result = await service.ingestFixes('v-1', [{ ...fixAt(90, 0), horizontalAccuracy: 75 }]);
      await service.whenIdle();

      expect(result).toEqual({ accepted: 0, rejected: 1 });
      expect(await stored()).toEqual(before);
      expect(notifier.sent).toEqual([]);
      expect(service.session('v-1')?.eta.latest).toBeNull();
    });
  });

  describe('stream messages', () => {
    it('publishes sampling modes and estimates', async () => {
      await schedule();
      await service.beginTracking('v-1');
      await service.ingestFixes('v-1', [fixAt(500, 0), fixAt(150, 30)]);
      await service.whenIdle();
      expect(publisher.modes.map((m) => `${m.visitId}:${m.profile.mode}`)).toEqual([
        'v-1:battery_efficient',
        'v-1:high_accuracy',
      ]);
      expect(publisher.etas.map((e) => Math.round(e.distanceMeters))).toEqual([500, 150]);
    });

    it('keeps working when the publisher fails', async () => {
      service = build({
        publisher: {
          publishVisit: () => Promise.reject(new Error('socket closed')),
          publishBooking: () => Promise.reject(new Error('socket closed')),
          publishEta: () => Promise.reject(new Error('socket closed')),
          publishSamplingMode: () => Promise.reject(new Error('socket closed')),
        },
      });
      await schedule();
      await expect(service.start('v-1')).resolves.toMatchObject({ status: 'active' });
    });
  });
});
