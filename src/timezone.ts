/**
 * Timezone resolution from GPS coordinates
 */

import { DateTime, IANAZone } from 'luxon';
import tzlookup from 'tz-lookup';
import type { GpsCoordinates, ResolvedTimestamp } from './types.js';

/**
 * Decimal places kept in the memo key (~11 m)
 */
const CACHE_PRECISION = 4;

/**
 * Zone of the machine running the export
 */
export function hostTimezone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

export function isValidTimezone(zone: string): boolean {
  return IANAZone.isValidZone(zone);
}

/**
 * Maps coordinates to IANA zone names using the bundled boundary data
 */
export class TimezoneResolver {
  private readonly cache = new Map<string, string | null>();

  constructor(private readonly lookup: (lat: number, lon: number) => string = tzlookup) {}

  /**
   * Zone for a coordinate, or the fallback when GPS is off, absent or unresolved
   */
  resolve(coord: GpsCoordinates | null, fallback: string, useGps: boolean): string {
    if (!useGps || !coord) {
      return fallback;
    }
    return this.lookupZone(coord) ?? fallback;
  }

  private lookupZone(coord: GpsCoordinates): string | null {
    const key = `${coord.latitude.toFixed(CACHE_PRECISION)},${coord.longitude.toFixed(CACHE_PRECISION)}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    let zone: string | null;
    try {
      zone = this.lookup(coord.latitude, coord.longitude);
    } catch {
      // lookup throws on coordinates outside the valid range
      zone = null;
    }

    // Etc/GMT±N are nautical zones returned for open water
    if (zone !== null && (zone.startsWith('Etc/') || !isValidTimezone(zone))) {
      zone = null;
    }

    this.cache.set(key, zone);
    return zone;
  }
}

/**
 * Convert a UTC instant to wall-clock time in a zone
 */
export function toLocal(utc: Date, zone: string): ResolvedTimestamp {
  return {
    zone,
    local: DateTime.fromJSDate(utc, { zone }),
  };
}

/**
 * Resolve the local capture time of a record
 */
export function resolveTimestamp(
  resolver: TimezoneResolver,
  takenAt: Date,
  location: GpsCoordinates | null,
  fallback: string,
  useGps: boolean
): ResolvedTimestamp {
  return toLocal(takenAt, resolver.resolve(location, fallback, useGps));
}
