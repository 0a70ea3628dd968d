import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import type { LocationPoint, RecordWriteEvent } from '@field-visit/domain';
import { createInMemoryRecordStore, type InMemoryRecordStore } from '../memory/record-store.js';

const T0 = Date.parse('2026-03-02T09:00:00Z');

function fix(latitude: number, offsetS = 0): LocationPoint {
  return {
    latitude,
    longitude: -0.12,
    altitude: 0,
    horizontalAccuracy: 5,
    speed: 1.4,
    course: 0,
    timestamp: new Date(T0 + offsetS * 1000),
  };
}

describe('in-memory record store', () => {
  let store: InMemoryRecordStore;
  let tick: number;

  beforeEach(() => {
    tick = 0;
    store = createInMemoryRecordStore(() => new Date(T0 + tick++ * 1000));
  });

  async function scheduleVisit(id = 'v-1') {
    return store.visits.create({
      id,
      bookingId: 'b-1',
      workerId: 'w-1',
      clientId: 'c-1',
      address: '1 Test Street',
      scheduledStart: new Date('2026-03-02T10:00:00Z'),
      scheduledEnd: new Date('2026-03-02T11:00:00Z'),
    });
  }

  describe('visits', () => {
    it('creates scheduled visits at revision 1', async () => {
      const visit = await scheduleVisit();
      expect(visit.status).toBe('scheduled');
      expect(visit.revision).toBe(1);
      expect(visit.actualStart).toBeNull();
      expect(visit.routePoints).toEqual([]);
      expect(visit.geofence).toEqual({ isInside: false, enteredAt: null, exitedAt: null });
    });

    it('bumps the revision on every write', async () => {
      await scheduleVisit();
      const a = await store.visits.update('v-1', { etaNotificationSent: true });
      const b = await store.visits.transition('v-1', ['scheduled'], { status: 'active', actualStart: new Date(T0) });
      expect(a.revision).toBe(2);
      expect(b?.revision).toBe(3);
    });

    it('update throws for unknown visits', async () => {
      await expect(store.visits.update('missing', { etaNotificationSent: true })).rejects.toThrow('visit missing not found');
    });

    it('transition is compare-and-set on status', async () => {
      await scheduleVisit();
      const first = await store.visits.transition('v-1', ['scheduled'], { status: 'active' });
      const second = await store.visits.transition('v-1', ['scheduled'], { status: 'active' });
      expect(first?.status).toBe('active');
      expect(second).toBeNull();
      expect((await store.visits.findById('v-1'))?.revision).toBe(2);
    });

    it('appends route points only while active and never lowers the distance', async () => {
      await scheduleVisit();
      expect(await store.visits.appendRoutePoint('v-1', fix(51.5), 0)).toBeNull();

      await store.visits.transition('v-1', ['scheduled'], { status: 'active' });
      const one = await store.visits.appendRoutePoint('v-1', fix(51.5), 10);
      const two = await store.visits.appendRoutePoint('v-1', fix(51.501, 30), 5);
      expect(one?.routePoints).toHaveLength(1);
      expect(two?.routePoints).toHaveLength(2);
      expect(two?.totalDistance).toBe(10);
    });

    it('lists visits updated since a watermark in update order', async () => {
      await scheduleVisit('v-1');
      await scheduleVisit('v-2');
      await store.visits.update('v-1', { etaNotificationSent: true });
      const since = new Date(T0 + 1000);
      const ids = (await store.visits.list({ updatedSince: since })).map((v) => v.id);
      expect(ids).toEqual(['v-2', 'v-1']);
    });

    it('pages in update order after a cursor', async () => {
      await scheduleVisit('v-1');
      const second = await scheduleVisit('v-2');
      await scheduleVisit('v-3');
      const first = (await store.visits.list({ limit: 2 })).map((v) => v.id);
      expect(first).toEqual(['v-1', 'v-2']);
      const rest = await store.visits.list({ limit: 2, after: { updatedAt: second.updatedAt, id: second.id } });
      expect(rest.map((v) => v.id)).toEqual(['v-3']);
    });
  });

  describe('bookings', () => {
    beforeEach(async () => {
      await store.bookings.create({
        id: 'b-1',
        clientId: 'c-1',
        workerId: 'w-1',
        status: 'approved',
        paymentStatus: 'confirmed',
        scheduledDate: new Date('2026-03-02T10:00:00Z'),
        price: 80,
      });
    });

    it('applies a projection from a newer revision', async () => {
      const at = new Date(T0 + 60_000);
      const booking = await store.bookings.applyStatusProjection('b-1', {
        status: 'in_progress',
        lastUpdated: at,
        visitRevision: 2,
      });
      expect(booking).toMatchObject({
        status: 'in_progress',
        lastUpdated: at,
        syncedRevision: 2,
        paymentStatus: 'confirmed',
        price: 80,
      });
    });

    it('skips projections that are not newer than the last applied one', async () => {
      await store.bookings.applyStatusProjection('b-1', { status: 'completed', lastUpdated: new Date(T0), visitRevision: 5 });
      const stale = await store.bookings.applyStatusProjection('b-1', {
        status: 'in_progress',
        lastUpdated: new Date(T0),
        visitRevision: 3,
      });
      const same = await store.bookings.applyStatusProjection('b-1', {
        status: 'in_progress',
        lastUpdated: new Date(T0),
        visitRevision: 5,
      });
      expect(stale).toBeNull();
      expect(same).toBeNull();
      expect((await store.bookings.findById('b-1'))?.status).toBe('completed');
    });
  });

  describe('write feed', () => {
    it('delivers after the write resolves, per collection', async () => {
      const seen: RecordWriteEvent[] = [];
      store.feed.subscribe('visits', (e) => {
        seen.push(e);
      });
      await scheduleVisit();
      expect(seen).toEqual([]);
      await store.feed.drain();
      expect(seen).toEqual([{ collection: 'visits', id: 'v-1', kind: 'create' }]);
    });

    it('stops delivering after unsubscribe', async () => {
      const seen: string[] = [];
      const unsubscribe = store.feed.subscribe('visits', (e) => {
        seen.push(e.id);
      });
      unsubscribe();
      await scheduleVisit();
      await store.feed.drain();
      expect(seen).toEqual([]);
    });

    it('keeps delivering when a handler throws', async () => {
      const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      const seen: string[] = [];
      store.feed.subscribe('visits', () => {
        throw new Error('handler failure');
      });
      store.feed.subscribe('visits', (e) => {
        seen.push(e.kind);
      });
      await scheduleVisit();
      await store.visits.update('v-1', { etaNotificationSent: true });
      await store.feed.drain();
      expect(seen).toEqual(['create', 'update']);
      expect(errorSpy).toHaveBeenCalledTimes(2);
      errorSpy.mockRestore();
    });
  });
});
