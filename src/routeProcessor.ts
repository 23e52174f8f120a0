import { RoutePlanCache, MemoryCacheStore, PgCacheStore } from './cache.js';
import { config } from './config.js';
import { pool } from './db.js';
import { toRoutePlanningError } from './errors.js';
import { createLogger } from './logger.js';
import { optimizeFuelStops, roundTo, type VehicleProfile } from './planning/fuelOptimizer.js';
import { buildDistanceProfile, totalRouteMiles } from './planning/geo.js';
import { projectStations, type ProjectionOptions } from './planning/stationProjector.js';
import { HtmlMapRenderer, type MapRenderer } from './services/mapRenderer.js';
import { OsrmRouteProvider, type RouteGeometryProvider } from './services/osrm.js';
import { getStationRepository, type StationRepository } from './stations/repository.js';
import type { Coordinate, RoutePlan, RoutePlanSummary } from './types/route.js';

const log = createLogger('route-processor');

export type RouteProcessorDeps = {
  stations: StationRepository;
  routing: RouteGeometryProvider;
  maps: MapRenderer;
  /** `null` runs every request through the full pipeline. */
  cache: RoutePlanCache | null;
  vehicle: VehicleProfile;
  projection: ProjectionOptions;
};

export function mapKeyFor(start: Coordinate, finish: Coordinate): string {
  return `${start.lon}_${start.lat}_${finish.lon}_${finish.lat}`;
}

export class RouteProcessor {
  constructor(private readonly deps: RouteProcessorDeps) {}

  /**
   * Plans fuel stops between two validated coordinates.
   *
   * @throws RoutePlanningError for every failure; `kind` names the stage and `cause` keeps the original error.
   */
  async plan(start: Coordinate, finish: Coordinate): Promise<RoutePlan> {
    try {
      return await this.planUncaught(start, finish);
    } catch (error) {
      const planningError = toRoutePlanningError(error);
      log.error({ err: error, kind: planningError.kind, start, finish }, 'Route planning failed');
      throw planningError;
    }
  }

  private async planUncaught(start: Coordinate, finish: Coordinate): Promise<RoutePlan> {
    const { stations, routing, maps, cache, vehicle, projection } = this.deps;

    // Cache key and projection both come from this one snapshot.
    const catalogue = await stations.getSnapshot();
    if (cache?.enabled) {
      const cached = await cache.get(start, finish, catalogue.hash);
      if (cached) {
        log.info({ start, finish, stops: cached.stops.length }, 'Route plan cache hit');
        return cached;
      }
    }

    const route = await routing.getRoute(start, finish);
    const profile = buildDistanceProfile(route);
    const totalDistance = totalRouteMiles(profile);

    const projected = projectStations(route, catalogue.stations, projection);
    const { stops, totalCost } = optimizeFuelStops(totalDistance, projected, vehicle);

    const mapReference = await maps.render(route, stops, mapKeyFor(start, finish));

    const plan: RoutePlan = {
      total_distance: roundTo(totalDistance, 1),
      stops,
      total_fuel_cost: roundTo(totalCost, 2),
      map_reference: mapReference,
    };
    log.info(
      { totalDistance: plan.total_distance, stops: stops.length, totalCost: plan.total_fuel_cost, candidates: projected.length },
      'Route plan computed',
    );

    if (cache) {
      await cache.set(start, finish, catalogue.hash, plan);
    }
    return plan;
  }
}

export function summarizeRoutePlan(plan: RoutePlan): RoutePlanSummary {
  const count = plan.stops.length;
  if (count === 0) {
    return { number_of_stops: 0, total_gallons: 0, average_price: 0, average_detour: 0 };
  }
  const totals = plan.stops.reduce(
    (acc, stop) => ({
      gallons: acc.gallons + stop.gallons,
      price: acc.price + stop.price,
      detour: acc.detour + stop.detour_miles,
    }),
    { gallons: 0, price: 0, detour: 0 },
  );
  return {
    number_of_stops: count,
    total_gallons: roundTo(totals.gallons, 2),
    average_price: roundTo(totals.price / count, 3),
    average_detour: roundTo(totals.detour / count, 2),
  };
}

function createRoutePlanCache(): RoutePlanCache | null {
  const options = { ttlSeconds: config.cache.routePlanTtlSeconds, schemaVersion: config.cache.schemaVersion };
  switch (config.cache.driver) {
    case 'postgres':
      return new RoutePlanCache(new PgCacheStore(pool), options);
    case 'memory':
      return new RoutePlanCache(new MemoryCacheStore(), options);
    case 'none':
      return null;
  }
}

/** The processor wired from configuration: OSRM, HTML maps, the shared station repository. */
export function createRouteProcessor(): RouteProcessor {
  return new RouteProcessor({
    stations: getStationRepository(),
    routing: new OsrmRouteProvider(),
    maps: new HtmlMapRenderer(),
    cache: createRoutePlanCache(),
    vehicle: {
      maxRangeMiles: config.fuel.maxRangeMiles,
      milesPerGallon: config.fuel.milesPerGallon,
    },
    projection: {
      corridorMiles: config.fuel.corridorBufferMiles,
      maxDetourMiles: config.fuel.maxDetourMiles,
      onRouteThresholdMiles: config.fuel.onRouteThresholdMiles,
    },
  });
}
