/**
 * Load a fuel station CSV into the fuel_stations table.
 *
 * Run with: npm run import:stations -- <path/to/stations.csv>
 * Without an argument STATIONS_CSV_PATH (or data/fuel_stations.csv) is used.
 */

import path from 'node:path';
import { config } from '../config.js';
import { pool } from '../db.js';
import { logger } from '../logger.js';
import { runMigrations } from '../migrations.js';
import { CsvStationSource } from '../stations/sources.js';
import type { StationRecord } from '../types/station.js';

const COLUMNS_PER_ROW = 7;
const BATCH_SIZE = 500;

// One INSERT cannot touch the same id twice; the last row for an id wins.
function dedupeById(stations: StationRecord[]): StationRecord[] {
  const byId = new Map<string, StationRecord>();
  for (const station of stations) byId.set(station.id, station);
  return [...byId.values()];
}

async function upsertStations(stations: StationRecord[]): Promise<void> {
  logger.info({ count: stations.length }, 'Upserting stations into database');

  const client = await pool.connect();
  let processed = 0;

  try {
    for (let i = 0; i < stations.length; i += BATCH_SIZE) {
      const batch = stations.slice(i, i + BATCH_SIZE);

      const values: unknown[] = [];
      const placeholders: string[] = [];

      batch.forEach((station, idx) => {
        const offset = idx * COLUMNS_PER_ROW;
        const slots = Array.from({ length: COLUMNS_PER_ROW }, (_, col) => `$${offset + col + 1}`);
        placeholders.push(`(${slots.join(', ')})`);
        values.push(
          station.id,
          station.name,
          station.latitude,
          station.longitude,
          station.price_per_gallon,
          station.city,
          station.state,
        );
      });

      await client.query(
        `
          INSERT INTO fuel_stations (id, name, latitude, longitude, price_per_gallon, city, state)
          VALUES ${placeholders.join(', ')}
          ON CONFLICT (id) DO UPDATE SET
            name = EXCLUDED.name,
            latitude = EXCLUDED.latitude,
            longitude = EXCLUDED.longitude,
            price_per_gallon = EXCLUDED.price_per_gallon,
            city = EXCLUDED.city,
            state = EXCLUDED.state,
            updated_at = CURRENT_TIMESTAMP
        `,
        values,
      );
      processed += batch.length;
      logger.debug({ processed, total: stations.length }, 'Upserted batch');
    }
  } finally {
    client.release();
  }
}

async function pruneMissingStations(keepIds: string[]): Promise<number> {
  const result = await pool.query('DELETE FROM fuel_stations WHERE NOT (id = ANY($1::text[]))', [keepIds]);
  return result.rowCount ?? 0;
}

async function main() {
  const csvArg = process.argv[2];
  const csvPath = csvArg ? path.resolve(csvArg) : config.stations.csvPath;

  await runMigrations();

  const source = new CsvStationSource(csvPath);
  const stations = dedupeById(await source.load());
  if (stations.length === 0) {
    throw new Error(`No stations found in ${csvPath}; refusing to prune the table`);
  }

  await upsertStations(stations);
  const pruned = await pruneMissingStations(stations.map((s) => s.id));

  const totalResult = await pool.query<{ total: string }>('SELECT COUNT(*) AS total FROM fuel_stations');
  logger.info({ total: Number(totalResult.rows[0]?.total ?? 0), pruned, source: source.description }, 'Station import finished');
}

main()
  .catch((error: unknown) => {
    logger.error({ err: error }, 'Station import failed');
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
  });
