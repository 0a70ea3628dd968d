import { EARTH_RADIUS_METERS, haversineDistance } from '@field-visit/domain';
import type { Coordinate } from '@field-visit/domain';
import type { SeededRng } from '@field-visit/adapters';

const METERS_PER_DEG_LAT = (Math.PI / 180) * EARTH_RADIUS_METERS;

/** Moves up to `meters` along the straight line toward `to`; lands on `to` when closer than that. */
export function stepToward(from: Coordinate, to: Coordinate, meters: number): Coordinate {
  const remaining = haversineDistance(from, to);
  if (remaining <= meters || remaining === 0) return to;
  const f = meters / remaining;
  return {
    latitude: from.latitude + (to.latitude - from.latitude) * f,
    longitude: from.longitude + (to.longitude - from.longitude) * f,
  };
}

/** Displaces a position by up to `maxMeters` on each axis. */
export function jitter(point: Coordinate, rng: SeededRng, maxMeters: number): Coordinate {
  const metersPerDegLng = METERS_PER_DEG_LAT * Math.cos((point.latitude * Math.PI) / 180);
  return {
    latitude: point.latitude + rng.between(-maxMeters, maxMeters) / METERS_PER_DEG_LAT,
    longitude: point.longitude + rng.between(-maxMeters, maxMeters) / metersPerDegLng,
  };
}

/** Initial bearing in degrees clockwise from north. */
export function bearing(from: Coordinate, to: Coordinate): number {
  const lat1 = (from.latitude * Math.PI) / 180;
  const lat2 = (to.latitude * Math.PI) / 180;
  const dLng = ((to.longitude - from.longitude) * Math.PI) / 180;
  const y = Math.sin(dLng) * Math.cos(lat2);
  const x = Math.cos(lat1) * Math.sin(lat2) - Math.sin(lat1) * Math.cos(lat2) * Math.cos(dLng);
  return ((Math.atan2(y, x) * 180) / Math.PI + 360) % 360;
}
