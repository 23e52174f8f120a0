import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(__dirname, '..', '.env') });

function readIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new Error(`Invalid integer for ${name}: "${raw}"`);
  }
  return value;
}

function readNumberEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = Number.parseFloat(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid number for ${name}: "${raw}"`);
  }
  return value;
}

function ensureOneOf<T extends string>(name: string, allowed: readonly T[], fallback: T): T {
  const raw = process.env[name];
  if (!raw) return fallback;
  const match = allowed.find((value) => value === raw);
  if (!match) {
    throw new Error(`Invalid value for ${name}: "${raw}" (expected one of ${allowed.join(', ')})`);
  }
  return match;
}

// 60 * 60 * 60 s is ~2.5 days. Possibly meant as one hour or one day; confirm before changing.
export const DEFAULT_ROUTE_PLAN_CACHE_TTL_SECONDS = 60 * 60 * 60;

export const config = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  port: readIntEnv('PORT', 3001),
  corsOrigin: process.env.CORS_ORIGIN ?? 'http://localhost:5173',
  logLevel: process.env.LOG_LEVEL,
  fuel: {
    maxRangeMiles: readNumberEnv('MAX_RANGE_MILES', 500),
    milesPerGallon: readNumberEnv('MILES_PER_GALLON', 10),
    maxDetourMiles: readNumberEnv('MAX_DETOUR_MILES', 10),
    corridorBufferMiles: readNumberEnv('CORRIDOR_BUFFER_MILES', 50),
    onRouteThresholdMiles: readNumberEnv('ON_ROUTE_THRESHOLD_MILES', 0.1),
  },
  cache: {
    driver: ensureOneOf('ROUTE_PLAN_CACHE_DRIVER', ['postgres', 'memory', 'none'] as const, 'memory'),
    routePlanTtlSeconds: readIntEnv('ROUTE_PLAN_CACHE_TTL_SECONDS', DEFAULT_ROUTE_PLAN_CACHE_TTL_SECONDS),
    schemaVersion: process.env.ROUTE_PLAN_CACHE_VERSION ?? '1',
  },
  stations: {
    source: ensureOneOf('STATIONS_SOURCE', ['csv', 'postgres'] as const, 'csv'),
    csvPath: process.env.STATIONS_CSV_PATH ?? path.resolve(__dirname, '..', 'data', 'fuel_stations.csv'),
  },
  routing: {
    osrmBaseUrl: process.env.OSRM_BASE_URL ?? 'https://router.project-osrm.org',
    timeoutMs: readIntEnv('OSRM_TIMEOUT_MS', 15_000),
  },
  maps: {
    outputDir: process.env.MAP_OUTPUT_DIR ?? path.resolve(__dirname, '..', 'maps'),
  },
  db: {
    host: process.env.DB_HOST ?? 'localhost',
    port: readIntEnv('DB_PORT', 5432),
    database: process.env.DB_NAME ?? 'fuel_planner',
    user: process.env.DB_USER ?? 'fuel_planner',
    password: process.env.DB_PASSWORD,
    ssl: process.env.DB_SSL === 'true',
    sslMode: ensureOneOf('DB_SSL_MODE', ['verify', 'no-verify'] as const, 'verify'),
    poolMax: readIntEnv('DB_POOL_MAX', 10),
    poolIdleTimeoutMs: readIntEnv('DB_POOL_IDLE_TIMEOUT_MS', 30_000),
    poolConnectionTimeoutMs: readIntEnv('DB_POOL_CONNECTION_TIMEOUT_MS', 5_000),
  },
} as const;

export function usesPostgres(): boolean {
  return config.cache.driver === 'postgres' || config.stations.source === 'postgres';
}
