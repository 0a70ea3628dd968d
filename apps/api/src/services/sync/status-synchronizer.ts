import { bookingStatusFor, SyncWriteFailureError } from '@field-visit/domain';
import type {
  BookingRecord,
  BookingRepositoryPort,
  ClockPort,
  NotificationDispatcherPort,
  NotificationRequest,
  RecordWriteFeedPort,
  StatusSyncPort,
  StreamPublisherPort,
  SyncResult,
  VisitCursor,
  VisitRecord,
  VisitRepositoryPort,
} from '@field-visit/domain';
import { createLogger, type Logger } from '../../lib/logger.js';

export interface StatusSynchronizerDeps {
  visits: VisitRepositoryPort;
  bookings: BookingRepositoryPort;
  feed: RecordWriteFeedPort;
  notifier: NotificationDispatcherPort;
  clock: ClockPort;
  publisher?: StreamPublisherPort;
  logger?: Logger;
  /** Visits read per page during a reconcile sweep. */
  reconcilePageSize?: number;
}

/**
 * Keeps each booking's status a projection of its visit.
 *
 * - Every trigger re-reads the visit; the trigger payload is never trusted.
 * - The write is conditional on the booking's `syncedRevision` being older than the visit revision,
 *   so repeated and out-of-order triggers converge.
 * - Only `status`, `lastUpdated` and `syncedRevision` are written.
 */
export class StatusSynchronizer implements StatusSyncPort {
  private unsubscribe: (() => void) | null = null;
  private readonly log: Logger;

  constructor(private readonly deps: StatusSynchronizerDeps) {
    this.log = deps.logger ?? createLogger('status-sync');
  }

  get isRunning(): boolean {
    return this.unsubscribe !== null;
  }

  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.deps.feed.subscribe('visits', async (event) => {
      await this.syncVisit(event.id);
    });
    this.log.info('subscribed to visit writes');
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  async syncVisit(visitId: string): Promise<SyncResult> {
    const visit = await this.deps.visits.findById(visitId);
    if (!visit) {
      this.log.warn(`visit ${visitId} vanished before sync`);
      return { visitId, outcome: 'visit_missing' };
    }

    const target = bookingStatusFor(visit.status);
    try {
      const booking = await this.deps.bookings.findById(visit.bookingId);
      if (!booking) {
        this.log.warn(`booking ${visit.bookingId} for visit ${visitId} not found; skipping`);
        return { visitId, bookingId: visit.bookingId, outcome: 'booking_missing' };
      }
      if (booking.status === target) {
        return { visitId, bookingId: booking.id, outcome: 'unchanged', bookingStatus: target };
      }

      const applied = await this.deps.bookings.applyStatusProjection(booking.id, {
        status: target,
        lastUpdated: await this.deps.clock.now(),
        visitRevision: visit.revision,
      });
      if (!applied) {
        this.log.debug(`booking ${booking.id} already holds revision >= ${visit.revision}`);
        return { visitId, bookingId: booking.id, outcome: 'stale', bookingStatus: booking.status };
      }

      this.log.info(`booking ${applied.id}: ${booking.status} -> ${applied.status} (visit rev ${visit.revision})`);
      this.afterApplied(visit, applied);
      return { visitId, bookingId: applied.id, outcome: 'applied', bookingStatus: applied.status };
    } catch (err) {
      const failure = new SyncWriteFailureError(visitId, visit.bookingId, err);
      this.log.error(failure.message, failure.details);
      return { visitId, bookingId: visit.bookingId, outcome: 'failed' };
    }
  }

  async reconcile(since: Date): Promise<SyncResult[]> {
    const limit = this.deps.reconcilePageSize ?? 500;
    const results: SyncResult[] = [];
    let after: VisitCursor | undefined;
    for (;;) {
      const page = await this.deps.visits.list({ updatedSince: since, after, limit });
      for (const visit of page) {
        results.push(await this.syncVisit(visit.id));
      }
      const last = page[page.length - 1];
      if (page.length < limit || !last) break;
      after = { updatedAt: last.updatedAt, id: last.id };
    }
    const applied = results.filter((r) => r.outcome === 'applied').length;
    if (applied > 0) this.log.info(`reconcile since ${since.toISOString()} applied ${applied} change(s)`);
    return results;
  }

  private afterApplied(visit: VisitRecord, booking: BookingRecord): void {
    this.deps.publisher?.publishBooking(booking).catch((err: unknown) => {
      this.log.warn(`booking publish failed for ${booking.id}`, err);
    });

    const notice = this.noticeFor(visit, booking);
    if (!notice) return;
    this.deps.notifier.dispatch(notice).catch((err: unknown) => {
      this.log.warn(`notification ${notice.metadata.type} to ${notice.userId} failed`, err);
    });
  }

  private noticeFor(visit: VisitRecord, booking: BookingRecord): NotificationRequest | null {
    const metadata = { visitId: visit.id, bookingId: booking.id };
    switch (booking.status) {
      case 'in_progress':
        return {
          userId: booking.clientId,
          title: 'Visit in progress',
          body: 'Your visit has started.',
          metadata: { ...metadata, type: 'visit_in_progress' },
        };
      case 'completed':
        return {
          userId: booking.clientId,
          title: 'Visit completed',
          body: 'Your visit is complete.',
          metadata: { ...metadata, type: 'visit_completed' },
        };
      case 'pending':
      case 'approved':
      case 'cancelled':
        return null;
    }
  }
}
