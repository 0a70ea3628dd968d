import { fetch, type Dispatcher } from 'undici';
import { z } from 'zod';
import type { Coordinate, GeocodingPort } from '@field-visit/domain';

const SearchResultSchema = z.array(
  z.object({
    lat: z.coerce.number().min(-90).max(90),
    lon: z.coerce.number().min(-180).max(180),
  }),
);

export interface NominatimOptions {
  baseUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
}

/** Forward geocoding against a Nominatim-compatible `/search` endpoint. */
export class NominatimGeocodingAdapter implements GeocodingPort {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(opts: NominatimOptions = {}) {
    this.baseUrl = (opts.baseUrl ?? process.env['GEOCODER_BASE_URL'] ?? 'https://nominatim.openstreetmap.org').replace(
      /\/+$/,
      '',
    );
    this.userAgent = opts.userAgent ?? 'field-visit-api';
    this.timeoutMs = opts.timeoutMs ?? 5_000;
    this.dispatcher = opts.dispatcher;
  }

  async resolveAddress(address: string): Promise<Coordinate | null> {
    const query = address.trim();
    if (!query) return null;

    const url = `${this.baseUrl}/search?format=json&limit=1&q=${encodeURIComponent(query)}`;
    const resp = await fetch(url, {
      headers: { accept: 'application/json', 'user-agent': this.userAgent },
      signal: AbortSignal.timeout(this.timeoutMs),
      ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
    });
    if (!resp.ok) {
      throw new Error(`geocoder responded ${resp.status} for "${query}"`);
    }

    const results = SearchResultSchema.parse(await resp.json());
    const first = results[0];
    return first ? { latitude: first.lat, longitude: first.lon } : null;
  }
}
