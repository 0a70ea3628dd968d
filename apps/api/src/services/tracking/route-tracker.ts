import type { LocationPoint } from '@field-visit/domain';
import { haversineDistance, routeDistance } from '@field-visit/domain';

/** In-memory copy of the persisted route with a running distance. */
export class RouteTracker {
  private readonly route: LocationPoint[];
  private running: number;

  constructor(initial: readonly LocationPoint[] = []) {
    this.route = [...initial];
    this.running = routeDistance(this.route);
  }

  get points(): readonly LocationPoint[] {
    return this.route;
  }

  get totalDistance(): number {
    return this.running;
  }

  /** Total the route would have with `point` appended. */
  distanceWith(point: LocationPoint): number {
    const last = this.route[this.route.length - 1];
    return last ? this.running + haversineDistance(last, point) : this.running;
  }

  add(point: LocationPoint): number {
    this.running = this.distanceWith(point);
    this.route.push(point);
    return this.running;
  }

  /** Recomputes the pairwise sum over the full route. */
  finalize(): number {
    this.running = routeDistance(this.route);
    return this.running;
  }
}
