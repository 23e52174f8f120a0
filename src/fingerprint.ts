import crypto from 'node:crypto';
import type { StationRecord } from './types/station.js';

export function sha256Hex(value: string): string {
  return crypto.createHash('sha256').update(value).digest('hex');
}

function field(value: string | number | null): string {
  return value === null ? '' : String(value);
}

/** Content hash of a station catalogue; row order is part of the content. */
export function fingerprintStations(stations: readonly StationRecord[]): string {
  const hash = crypto.createHash('sha256');
  hash.update(`stations:v1:${stations.length}\n`);
  for (const s of stations) {
    hash.update(
      [s.id, s.name, s.latitude, s.longitude, s.price_per_gallon, s.city, s.state]
        .map((value) => JSON.stringify(field(value)))
        .join(','),
    );
    hash.update('\n');
  }
  return hash.digest('hex');
}
