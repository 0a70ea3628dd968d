import { VisitNotFoundError } from '@field-visit/domain';
import type {
  LocationPoint,
  NewVisit,
  VisitListFilters,
  VisitPatch,
  VisitRecord,
  VisitRepositoryPort,
  VisitStatus,
  VisitTransitionPatch,
} from '@field-visit/domain';
import { getPool } from './pool.js';
import { mapVisitRow, type VisitRow } from './rows.js';

interface SetClause {
  sets: string[];
  params: unknown[];
}

/**
 * Translates a patch into SET assignments starting at placeholder `$firstIdx`.
 * JSON columns are written with JSON.stringify, which renders Dates as ISO strings.
 */
export function buildVisitSetClause(patch: VisitPatch, firstIdx: number): SetClause {
  const sets: string[] = [];
  const params: unknown[] = [];
  let idx = firstIdx;
  const assign = (column: string, value: unknown, expr = `$${idx}`): void => {
    sets.push(`${column} = ${expr}`);
    params.push(value);
    idx++;
  };

  if (patch.destination !== undefined) {
    assign('destination_lat', patch.destination?.latitude ?? null);
    assign('destination_lng', patch.destination?.longitude ?? null);
  }
  if (patch.actualStart !== undefined) assign('actual_start', patch.actualStart);
  if (patch.actualEnd !== undefined) assign('actual_end', patch.actualEnd);
  if (patch.totalDistance !== undefined) {
    assign('total_distance', patch.totalDistance, `GREATEST(total_distance, $${idx})`);
  }
  if (patch.autoCheckedIn !== undefined) assign('auto_checked_in', patch.autoCheckedIn);
  if (patch.autoCheckIn !== undefined) {
    assign('auto_check_in', patch.autoCheckIn === null ? null : JSON.stringify(patch.autoCheckIn));
  }
  if (patch.geofence !== undefined) assign('geofence', JSON.stringify(patch.geofence));
  if (patch.etaNotificationSent !== undefined) assign('eta_notification_sent', patch.etaNotificationSent);
  if (patch.etaNotification !== undefined) {
    assign('eta_notification', patch.etaNotification === null ? null : JSON.stringify(patch.etaNotification));
  }
  if (patch.cancellationReason !== undefined) assign('cancellation_reason', patch.cancellationReason);
  if (patch.cancelledAt !== undefined) assign('cancelled_at', patch.cancelledAt);

  sets.push('revision = revision + 1', 'updated_at = NOW()');
  return { sets, params };
}

export class PgVisitRepository implements VisitRepositoryPort {
  async findById(visitId: string): Promise<VisitRecord | null> {
    const { rows } = await getPool().query<VisitRow>(
      `SELECT * FROM field.visits WHERE id = $1`,
      [visitId],
    );
    return rows[0] ? mapVisitRow(rows[0]) : null;
  }

  async list(filters: VisitListFilters = {}): Promise<VisitRecord[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let idx = 1;

    if (filters.updatedSince) {
      conditions.push(`updated_at >= $${idx++}`);
      params.push(filters.updatedSince);
    }
    if (filters.statuses) {
      conditions.push(`status = ANY($${idx++})`);
      params.push(filters.statuses);
    }
    if (filters.after) {
      conditions.push(`(updated_at, id) > ($${idx++}, $${idx++})`);
      params.push(filters.after.updatedAt, filters.after.id);
    }

    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    const limit = filters.limit ?? 500;

    const { rows } = await getPool().query<VisitRow>(
      `SELECT * FROM field.visits ${where} ORDER BY updated_at, id LIMIT $${idx++}`,
      [...params, limit],
    );
    return rows.map(mapVisitRow);
  }

  async create(visit: NewVisit): Promise<VisitRecord> {
    const { rows } = await getPool().query<VisitRow>(
      `INSERT INTO field.visits
        (id, booking_id, worker_id, client_id, worker_name, client_name, service_summary, note,
         address, destination_lat, destination_lng, scheduled_start, scheduled_end)
       VALUES (COALESCE($1, gen_random_uuid()::text),$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13)
       RETURNING *`,
      [
        visit.id ?? null,
        visit.bookingId,
        visit.workerId,
        visit.clientId,
        visit.workerName ?? null,
        visit.clientName ?? null,
        visit.serviceSummary ?? null,
        visit.note ?? null,
        visit.address,
        visit.destination?.latitude ?? null,
        visit.destination?.longitude ?? null,
        visit.scheduledStart,
        visit.scheduledEnd,
      ],
    );
    const row = rows[0];
    if (!row) throw new Error(`insert of visit for booking ${visit.bookingId} returned no row`);
    return mapVisitRow(row);
  }

  async update(visitId: string, patch: VisitPatch): Promise<VisitRecord> {
    const { sets, params } = buildVisitSetClause(patch, 2);
    const { rows } = await getPool().query<VisitRow>(
      `UPDATE field.visits SET ${sets.join(', ')} WHERE id = $1 RETURNING *`,
      [visitId, ...params],
    );
    const row = rows[0];
    if (!row) throw new VisitNotFoundError(visitId);
    return mapVisitRow(row);
  }

  async transition(
    visitId: string,
    from: readonly VisitStatus[],
    patch: VisitTransitionPatch,
  ): Promise<VisitRecord | null> {
    const { status, ...fields } = patch;
    const { sets, params } = buildVisitSetClause(fields, 4);
    const { rows } = await getPool().query<VisitRow>(
      `UPDATE field.visits SET status = $2, ${sets.join(', ')}
       WHERE id = $1 AND status = ANY($3)
       RETURNING *`,
      [visitId, status, [...from], ...params],
    );
    return rows[0] ? mapVisitRow(rows[0]) : null;
  }

  async appendRoutePoint(
    visitId: string,
    point: LocationPoint,
    totalDistance: number,
  ): Promise<VisitRecord | null> {
    const { rows } = await getPool().query<VisitRow>(
      `UPDATE field.visits SET
         route_points = route_points || $2::jsonb,
         total_distance = GREATEST(total_distance, $3),
         revision = revision + 1,
         updated_at = NOW()
       WHERE id = $1 AND status = 'active'
       RETURNING *`,
      [visitId, JSON.stringify([point]), totalDistance],
    );
    return rows[0] ? mapVisitRow(rows[0]) : null;
  }
}
