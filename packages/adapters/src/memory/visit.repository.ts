import { randomUUID } from 'node:crypto';
import {
  INITIAL_GEOFENCE_STATE,
  VisitNotFoundError,
} from '@field-visit/domain';
import type {
  LocationPoint,
  NewVisit,
  VisitCursor,
  VisitListFilters,
  VisitPatch,
  VisitRecord,
  VisitRepositoryPort,
  VisitStatus,
  VisitTransitionPatch,
} from '@field-visit/domain';
import type { InMemoryWriteFeed } from './write-feed.js';

export class InMemoryVisitRepository implements VisitRepositoryPort {
  private readonly rows = new Map<string, VisitRecord>();

  constructor(
    private readonly feed?: InMemoryWriteFeed,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async findById(visitId: string): Promise<VisitRecord | null> {
    return this.rows.get(visitId) ?? null;
  }

  async list(filters: VisitListFilters = {}): Promise<VisitRecord[]> {
    const { updatedSince, statuses, after } = filters;
    const matches = [...this.rows.values()]
      .filter((v) => !updatedSince || v.updatedAt.getTime() >= updatedSince.getTime())
      .filter((v) => !statuses || statuses.includes(v.status))
      .filter((v) => !after || compareCursor(v, after) > 0)
      .sort(compareCursor);
    return matches.slice(0, filters.limit ?? 500);
  }

  async create(visit: NewVisit): Promise<VisitRecord> {
    const ts = this.now();
    const record: VisitRecord = {
      id: visit.id ?? randomUUID(),
      bookingId: visit.bookingId,
      workerId: visit.workerId,
      clientId: visit.clientId,
      workerName: visit.workerName,
      clientName: visit.clientName,
      serviceSummary: visit.serviceSummary,
      note: visit.note,
      address: visit.address,
      destination: visit.destination ?? null,
      status: 'scheduled',
      scheduledStart: visit.scheduledStart,
      scheduledEnd: visit.scheduledEnd,
      actualStart: null,
      actualEnd: null,
      routePoints: [],
      totalDistance: 0,
      autoCheckedIn: false,
      autoCheckIn: null,
      geofence: INITIAL_GEOFENCE_STATE,
      etaNotificationSent: false,
      etaNotification: null,
      cancellationReason: null,
      cancelledAt: null,
      revision: 1,
      createdAt: ts,
      updatedAt: ts,
    };
    this.rows.set(record.id, record);
    this.feed?.emit({ collection: 'visits', id: record.id, kind: 'create' });
    return record;
  }

  async update(visitId: string, patch: VisitPatch): Promise<VisitRecord> {
    const row = this.rows.get(visitId);
    if (!row) throw new VisitNotFoundError(visitId);
    return this.write({
      ...row,
      ...patch,
      totalDistance: Math.max(row.totalDistance, patch.totalDistance ?? row.totalDistance),
    });
  }

  async transition(
    visitId: string,
    from: readonly VisitStatus[],
    patch: VisitTransitionPatch,
  ): Promise<VisitRecord | null> {
    const row = this.rows.get(visitId);
    if (!row || !from.includes(row.status)) return null;
    return this.write({
      ...row,
      ...patch,
      totalDistance: Math.max(row.totalDistance, patch.totalDistance ?? row.totalDistance),
    });
  }

  async appendRoutePoint(
    visitId: string,
    point: LocationPoint,
    totalDistance: number,
  ): Promise<VisitRecord | null> {
    const row = this.rows.get(visitId);
    if (!row || row.status !== 'active') return null;
    return this.write({
      ...row,
      routePoints: [...row.routePoints, point],
      totalDistance: Math.max(row.totalDistance, totalDistance),
    });
  }

  private write(next: VisitRecord): VisitRecord {
    const previous = this.rows.get(next.id);
    const record: VisitRecord = {
      ...next,
      revision: (previous?.revision ?? 0) + 1,
      updatedAt: this.now(),
    };
    this.rows.set(record.id, record);
    this.feed?.emit({ collection: 'visits', id: record.id, kind: 'update' });
    return record;
  }
}

function compareCursor(a: VisitCursor, b: VisitCursor): number {
  const byTime = a.updatedAt.getTime() - b.updatedAt.getTime();
  if (byTime !== 0) return byTime;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
