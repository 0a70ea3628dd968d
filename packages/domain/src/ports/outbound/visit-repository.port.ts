import type { LocationPoint } from '../../entities/location-point.js';
import type {
  NewVisit,
  VisitPatch,
  VisitRecord,
  VisitStatus,
  VisitTransitionPatch,
} from '../../entities/visit.js';

/** Position in `(updatedAt, id)` order; a page starts strictly after it. */
export interface VisitCursor {
  updatedAt: Date;
  id: string;
}

export interface VisitListFilters {
  updatedSince?: Date;
  statuses?: VisitStatus[];
  after?: VisitCursor;
  /** Page size, 500 when omitted. Results are ordered by `(updatedAt, id)`. */
  limit?: number;
}

export interface VisitRepositoryPort {
  findById(visitId: string): Promise<VisitRecord | null>;
  list(filters?: VisitListFilters): Promise<VisitRecord[]>;
  create(visit: NewVisit): Promise<VisitRecord>;
  /** Field-level update; never changes `status`. Throws VisitNotFoundError for unknown ids. */
  update(visitId: string, patch: VisitPatch): Promise<VisitRecord>;
  /**
   * Compare-and-set status change: applied only while the stored status is one of `from`.
   * Resolves null when the precondition no longer holds (or the visit is gone).
   */
  transition(
    visitId: string,
    from: readonly VisitStatus[],
    patch: VisitTransitionPatch,
  ): Promise<VisitRecord | null>;
  /**
   * Appends to `routePoints` while the visit is active; `totalDistance` is kept at the larger of the
   * stored and given value. Resolves null when the visit is not active.
   */
  appendRoutePoint(
    visitId: string,
    point: LocationPoint,
    totalDistance: number,
  ): Promise<VisitRecord | null>;
}
