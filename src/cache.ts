import type { Pool } from 'pg';
import { sha256Hex } from './fingerprint.js';
import { createLogger } from './logger.js';
import type { Coordinate, FuelStop, RoutePlan } from './types/route.js';

const log = createLogger('cache');

export interface CacheStore {
  get(key: string): Promise<unknown | null>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
}

function serializeCoordinate(point: Coordinate): string {
  return `${point.lat.toFixed(6)},${point.lon.toFixed(6)}`;
}

export function makeRoutePlanCacheKey(options: {
  start: Coordinate;
  finish: Coordinate;
  stationsHash: string;
  schemaVersion: string;
}): string {
  const payload = [
    `route-plan:v${options.schemaVersion}`,
    `start=${serializeCoordinate(options.start)}`,
    `finish=${serializeCoordinate(options.finish)}`,
    `stations=${options.stationsHash}`,
  ].join(':');
  return `route-plan:${sha256Hex(payload)}`;
}

const warned = new Set<string>();

// First failure per operation at warn, repeats at debug.
export function logCacheFailure(operation: string, error: unknown): void {
  const message = `Route plan cache ${operation} failed; continuing without cache`;
  if (warned.has(operation)) {
    log.debug({ err: error }, message);
    return;
  }
  warned.add(operation);
  log.warn({ err: error }, message);
}

const CLEANUP_INTERVAL_MS = 60 * 60 * 1000;

export class PgCacheStore implements CacheStore {
  private lastCleanup = 0;

  constructor(private readonly pool: Pool) {}

  async get(key: string): Promise<unknown | null> {
    const result = await this.pool.query<{ plan_json: unknown }>(
      `
        SELECT plan_json
        FROM route_plan_cache
        WHERE cache_key = $1
          AND expires_at > NOW()
        LIMIT 1
      `,
      [key]
    );
    return result.rows[0]?.plan_json ?? null;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    await this.maybeCleanup();
    await this.pool.query(
      `
        INSERT INTO route_plan_cache (cache_key, plan_json, expires_at)
        VALUES ($1, $2::jsonb, NOW() + ($3 * INTERVAL '1 second'))
        ON CONFLICT (cache_key) DO UPDATE SET
          plan_json = EXCLUDED.plan_json,
          updated_at = NOW(),
          expires_at = EXCLUDED.expires_at
      `,
      [key, JSON.stringify(value), Math.floor(ttlSeconds)]
    );
  }

  private async maybeCleanup(): Promise<void> {
    const now = Date.now();
    if (now - this.lastCleanup < CLEANUP_INTERVAL_MS) return;
    this.lastCleanup = now;
    try {
      await this.pool.query('DELETE FROM route_plan_cache WHERE expires_at < NOW()');
    } catch (error) {
      logCacheFailure('cleanup', error);
    }
  }
}

type MemoryEntry = { json: string; expiresAt: number };

/**
 * In-process store. Values are kept serialized so readers never share objects.
 * Expired entries are swept on write once the earliest expiry has passed.
 */
export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, MemoryEntry>();
  private nextExpiry = Infinity;

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<unknown | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    const value: unknown = JSON.parse(entry.json);
    return value;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    const now = this.now();
    if (now >= this.nextExpiry) this.sweep(now);

    const expiresAt = now + ttlSeconds * 1000;
    this.entries.set(key, { json: JSON.stringify(value), expiresAt });
    this.nextExpiry = Math.min(this.nextExpiry, expiresAt);
  }

  get size(): number {
    return this.entries.size;
  }

  private sweep(now: number): void {
    let nextExpiry = Infinity;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      } else {
        nextExpiry = Math.min(nextExpiry, entry.expiresAt);
      }
    }
    this.nextExpiry = nextExpiry;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function parseFuelStop(value: unknown): FuelStop | null {
  if (!isRecord(value)) return null;
  const {
    station_id, name, route_mile, price, latitude, longitude,
    distance_to_route, detour_miles, on_route, gallons, cost, buy_reason,
  } = value;
  if (typeof station_id !== 'string' || typeof name !== 'string') return null;
  if (typeof on_route !== 'boolean' || typeof buy_reason !== 'string') return null;
  if (
    !isFiniteNumber(route_mile) || !isFiniteNumber(price) || !isFiniteNumber(latitude)
    || !isFiniteNumber(longitude) || !isFiniteNumber(distance_to_route) || !isFiniteNumber(detour_miles)
    || !isFiniteNumber(gallons) || !isFiniteNumber(cost)
  ) {
    return null;
  }
  return {
    station_id, name, route_mile, price, latitude, longitude,
    distance_to_route, detour_miles, on_route, gallons, cost, buy_reason,
  };
}

/** Validates a cached value; anything that is not a complete plan reads as a miss. */
export function parseRoutePlan(value: unknown): RoutePlan | null {
  if (!isRecord(value)) return null;
  const { total_distance, total_fuel_cost, map_reference, stops } = value;
  if (!isFiniteNumber(total_distance) || !isFiniteNumber(total_fuel_cost)) return null;
  if (typeof map_reference !== 'string' || !Array.isArray(stops)) return null;

  const parsedStops: FuelStop[] = [];
  for (const stop of stops) {
    const parsed = parseFuelStop(stop);
    if (!parsed) return null;
    parsedStops.push(parsed);
  }
  return { total_distance, total_fuel_cost, map_reference, stops: parsedStops };
}

export type RoutePlanCacheOptions = {
  ttlSeconds: number;
  schemaVersion: string;
};

/**
 * Best-effort plan cache. Store failures are logged and treated as a miss (read)
 * or dropped (write); they never reach the caller.
 */
export class RoutePlanCache {
  constructor(
    private readonly store: CacheStore,
    private readonly options: RoutePlanCacheOptions,
  ) {}

  get enabled(): boolean {
    return Number.isFinite(this.options.ttlSeconds) && this.options.ttlSeconds > 0;
  }

  keyFor(start: Coordinate, finish: Coordinate, stationsHash: string): string {
    return makeRoutePlanCacheKey({ start, finish, stationsHash, schemaVersion: this.options.schemaVersion });
  }

  async get(start: Coordinate, finish: Coordinate, stationsHash: string): Promise<RoutePlan | null> {
    if (!this.enabled) return null;
    const key = this.keyFor(start, finish, stationsHash);
    try {
      const cached = await this.store.get(key);
      if (cached === null) return null;
      const plan = parseRoutePlan(cached);
      if (!plan) {
        log.warn({ key }, 'Ignoring malformed cached route plan');
      }
      return plan;
    } catch (error) {
      logCacheFailure('get', error);
      return null;
    }
  }

  async set(start: Coordinate, finish: Coordinate, stationsHash: string, plan: RoutePlan): Promise<void> {
    if (!this.enabled) return;
    const key = this.keyFor(start, finish, stationsHash);
    try {
      await this.store.set(key, plan, this.options.ttlSeconds);
    } catch (error) {
      logCacheFailure('set', error);
    }
  }
}
