import { config } from '../config.js';
import { RoutingProviderError, toErrorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Coordinate } from '../types/route.js';

const log = createLogger('osrm');

export interface RouteGeometryProvider {
  /** Waypoints of one driving route from `start` to `finish`, in order. */
  getRoute(start: Coordinate, finish: Coordinate): Promise<Coordinate[]>;
}

export type OsrmOptions = {
  baseUrl: string;
  timeoutMs: number;
};

export function routePath(start: Coordinate, finish: Coordinate): string {
  return `/route/v1/driving/${start.lon},${start.lat};${finish.lon},${finish.lat}?overview=full&geometries=geojson`;
}

/** Reads the first route of an OSRM response as `{lat, lon}` waypoints. */
export function parseOsrmRoute(data: unknown): Coordinate[] {
  if (!data || typeof data !== 'object') {
    throw new RoutingProviderError('Unexpected OSRM response: expected an object');
  }

  const { code, message, routes } = data as { code?: unknown; message?: unknown; routes?: unknown };
  if (code !== 'Ok') {
    const detail = typeof message === 'string' ? `: ${message}` : '';
    throw new RoutingProviderError(`OSRM could not route (${String(code)})${detail}`);
  }
  if (!Array.isArray(routes) || routes.length === 0) {
    throw new RoutingProviderError('Unexpected OSRM response: no routes');
  }

  const line = (routes[0] as { geometry?: { coordinates?: unknown } } | null)?.geometry?.coordinates;
  if (!Array.isArray(line)) {
    throw new RoutingProviderError('Unexpected OSRM response: route has no geometry');
  }

  const waypoints: Coordinate[] = [];
  for (const point of line) {
    if (!Array.isArray(point) || point.length < 2) continue;
    const [lon, lat] = point;
    if (typeof lat !== 'number' || typeof lon !== 'number') continue;
    if (!Number.isFinite(lat) || !Number.isFinite(lon)) continue;
    waypoints.push({ lat, lon });
  }
  return waypoints;
}

/** OSRM HTTP client. One attempt per call; the timeout covers the body read too. */
export class OsrmRouteProvider implements RouteGeometryProvider {
  private readonly options: OsrmOptions;

  constructor(options: Partial<OsrmOptions> = {}) {
    this.options = {
      baseUrl: options.baseUrl ?? config.routing.osrmBaseUrl,
      timeoutMs: options.timeoutMs ?? config.routing.timeoutMs,
    };
  }

  async getRoute(start: Coordinate, finish: Coordinate): Promise<Coordinate[]> {
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}${routePath(start, finish)}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    let data: unknown;
    try {
      const response = await fetch(url, { signal: controller.signal });
      if (!response.ok) {
        const text = await response.text();
        throw new RoutingProviderError(
          `OSRM directions error: ${response.status} ${response.statusText}\n${text}`,
          response.status,
        );
      }
      data = await response.json();
    } catch (error) {
      if (error instanceof RoutingProviderError) throw error;
      if (controller.signal.aborted) {
        throw new RoutingProviderError(
          `OSRM request failed: timed out after ${this.options.timeoutMs} ms`,
          undefined,
          { cause: error },
        );
      }
      if (error instanceof SyntaxError) {
        throw new RoutingProviderError('Unexpected OSRM response: body is not JSON', undefined, { cause: error });
      }
      throw new RoutingProviderError(`OSRM request failed: ${toErrorMessage(error)}`, undefined, { cause: error });
    } finally {
      clearTimeout(timer);
    }

    const waypoints = parseOsrmRoute(data);
    log.debug({ waypoints: waypoints.length }, 'Fetched route geometry');
    return waypoints;
  }
}
