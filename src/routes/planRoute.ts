import { Router } from 'express';
import { toRoutePlanningError, type RoutePlanningErrorKind } from '../errors.js';
import { routeLimiter } from '../middleware/rateLimiter.js';
import { summarizeRoutePlan, type RouteProcessor } from '../routeProcessor.js';
import { ensureNumber } from '../stations/csv.js';
import type { Coordinate } from '../types/route.js';

const STATUS_BY_KIND: Record<RoutePlanningErrorKind, number> = {
  invalid_route_geometry: 422,
  out_of_fuel: 422,
  routing_provider: 502,
  station_load: 503,
  map_render: 500,
  unexpected: 500,
};

function toCoordinate(lat: number | null, lon: number | null): Coordinate | null {
  if (lat === null || lon === null) return null;
  if (lat < -90 || lat > 90 || lon < -180 || lon > 180) return null;
  return { lat, lon };
}

/**
 * Accepts `"lat,lon"` or `{ lat, lon }` (`lng` also accepted); numeric strings are fine.
 * Returns null for anything else, including out-of-range values.
 */
export function readCoordinate(value: unknown): Coordinate | null {
  if (typeof value === 'string') {
    const parts = value.split(',');
    if (parts.length !== 2) return null;
    return toCoordinate(ensureNumber(parts[0]), ensureNumber(parts[1]));
  }
  if (value && typeof value === 'object') {
    const { lat, lon, lng } = value as { lat?: unknown; lon?: unknown; lng?: unknown };
    return toCoordinate(ensureNumber(lat), ensureNumber(lon ?? lng));
  }
  return null;
}

export function createPlanRouteRouter(processor: RouteProcessor): Router {
  const router = Router();

  router.post('/', routeLimiter, async (req, res) => {
    const body = req.body as { start?: unknown; finish?: unknown } | undefined;
    if (body?.start === undefined || body.finish === undefined) {
      return res.status(400).json({ error: 'start and finish are required' });
    }

    const start = readCoordinate(body.start);
    const finish = readCoordinate(body.finish);
    if (!start || !finish) {
      return res.status(400).json({
        error: `Could not read ${start ? 'finish' : 'start'} coordinate; expected "lat,lon" or { lat, lon }`,
      });
    }

    try {
      const plan = await processor.plan(start, finish);
      return res.json({
        start_location: start,
        finish_location: finish,
        ...plan,
        distance_unit: 'miles',
        summary: summarizeRoutePlan(plan),
      });
    } catch (error) {
      const planningError = toRoutePlanningError(error);
      return res.status(STATUS_BY_KIND[planningError.kind]).json({
        error: 'Failed to plan route',
        kind: planningError.kind,
        detail: planningError.message,
      });
    }
  });

  return router;
}
