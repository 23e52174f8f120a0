import fs from 'node:fs/promises';
import type { Pool } from 'pg';
import type { StationRecord } from '../types/station.js';
import { createLogger } from '../logger.js';
import { ensureNumber, ensureString, findColumn, normalizeCsvText, parseCsvLine } from './csv.js';

const log = createLogger('stations');

export interface StationSource {
  readonly description: string;
  load(): Promise<StationRecord[]>;
}

const COLUMN_ALIASES = {
  id: ['id', 'station_id', 'opis truckstop id'],
  name: ['name', 'station_name', 'truckstop name'],
  latitude: ['latitude', 'lat'],
  longitude: ['longitude', 'lon', 'lng'],
  price: ['price_per_gallon', 'retail price', 'price'],
  city: ['city'],
  state: ['state'],
} as const;

/**
 * Parses a station CSV. Rows with an empty or non-numeric latitude/longitude are
 * kept with `null` coordinates; rows without a usable price are skipped.
 *
 * @throws Error when the header lacks a latitude, longitude or price column.
 */
export function parseStationsCsv(text: string): StationRecord[] {
  const lines = text.replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n');
  const headerLine = lines[0] ?? '';
  const headers = parseCsvLine(headerLine.replace(/^\ufeff/, ''));

  const col = {
    id: findColumn(headers, COLUMN_ALIASES.id),
    name: findColumn(headers, COLUMN_ALIASES.name),
    latitude: findColumn(headers, COLUMN_ALIASES.latitude),
    longitude: findColumn(headers, COLUMN_ALIASES.longitude),
    price: findColumn(headers, COLUMN_ALIASES.price),
    city: findColumn(headers, COLUMN_ALIASES.city),
    state: findColumn(headers, COLUMN_ALIASES.state),
  };

  const missing = (['latitude', 'longitude', 'price'] as const).filter((key) => col[key] === -1);
  if (missing.length > 0) {
    throw new Error(`Station CSV is missing required column(s): ${missing.join(', ')}`);
  }

  const stations: StationRecord[] = [];
  let skipped = 0;

  for (let i = 1; i < lines.length; i += 1) {
    const line = normalizeCsvText(lines[i] ?? '');
    if (!line) continue;

    const cols = parseCsvLine(line);
    const price = ensureNumber(cols[col.price]);
    if (price === null) {
      skipped += 1;
      continue;
    }

    const id = ensureString(cols[col.id]) ?? String(i);
    stations.push({
      id,
      name: ensureString(cols[col.name]) ?? `Station ${id}`,
      latitude: ensureNumber(cols[col.latitude]),
      longitude: ensureNumber(cols[col.longitude]),
      price_per_gallon: price,
      city: ensureString(cols[col.city]),
      state: ensureString(cols[col.state]),
    });
  }

  if (skipped > 0) {
    log.warn({ skipped }, 'Skipped station rows without a usable price');
  }
  return stations;
}

export class CsvStationSource implements StationSource {
  constructor(private readonly csvPath: string) {}

  get description(): string {
    return `csv:${this.csvPath}`;
  }

  async load(): Promise<StationRecord[]> {
    const buffer = await fs.readFile(this.csvPath);
    let text = buffer.toString('utf8');
    if (text.includes('\uFFFD')) {
      // Fallback for non-UTF8 datasets (common in legacy CSV exports).
      text = buffer.toString('latin1');
    }
    return parseStationsCsv(text);
  }
}

type FuelStationRow = {
  id: string | number;
  name: string;
  latitude: number | null;
  longitude: number | null;
  price_per_gallon: string | number;
  city: string | null;
  state: string | null;
};

export class PgStationSource implements StationSource {
  readonly description = 'postgres:fuel_stations';

  constructor(private readonly pool: Pool) {}

  async load(): Promise<StationRecord[]> {
    const result = await this.pool.query<FuelStationRow>(
      `
        SELECT id, name, latitude, longitude, price_per_gallon, city, state
        FROM fuel_stations
        ORDER BY id
      `
    );

    const stations: StationRecord[] = [];
    for (const row of result.rows) {
      // NUMERIC columns come back as strings
      const price = ensureNumber(row.price_per_gallon);
      if (price === null) continue;
      stations.push({
        id: String(row.id),
        name: row.name,
        latitude: ensureNumber(row.latitude),
        longitude: ensureNumber(row.longitude),
        price_per_gallon: price,
        city: row.city,
        state: row.state,
      });
    }
    return stations;
  }
}
