import type { Coordinate } from '../../entities/location-point.js';

export interface GeocodingPort {
  /** Resolves null when the address matches nothing. */
  resolveAddress(address: string): Promise<Coordinate | null>;
}
