import type { Coordinate, ProjectedStop } from '../types/route.js';
import type { StationRecord } from '../types/station.js';
import { EARTH_RADIUS_MILES, MILES_PER_DEGREE, buildDistanceProfile, degreesToRadians } from './geo.js';

export type ProjectionOptions = {
  corridorMiles: number;
  maxDetourMiles: number;
  onRouteThresholdMiles: number;
};

export const DEFAULT_PROJECTION_OPTIONS: ProjectionOptions = {
  corridorMiles: 50,
  maxDetourMiles: 10,
  onRouteThresholdMiles: 0.1,
};

export type Bounds = { minLat: number; maxLat: number; minLon: number; maxLon: number };

export function computeCorridorBounds(geometry: readonly Coordinate[], corridorMiles: number): Bounds {
  let minLat = Infinity;
  let maxLat = -Infinity;
  let minLon = Infinity;
  let maxLon = -Infinity;

  for (const { lat, lon } of geometry) {
    if (lat < minLat) minLat = lat;
    if (lat > maxLat) maxLat = lat;
    if (lon < minLon) minLon = lon;
    if (lon > maxLon) maxLon = lon;
  }

  const pad = corridorMiles / MILES_PER_DEGREE;
  return {
    minLat: minLat - pad,
    maxLat: maxLat + pad,
    minLon: minLon - pad,
    maxLon: maxLon + pad,
  };
}

function withinBounds(lat: number, lon: number, bounds: Bounds): boolean {
  return lat >= bounds.minLat && lat <= bounds.maxLat && lon >= bounds.minLon && lon <= bounds.maxLon;
}

// Per-waypoint trig, computed once per projection instead of once per station/waypoint pair.
type RouteIndex = {
  latRad: Float64Array;
  lonRad: Float64Array;
  cosLat: Float64Array;
};

function buildRouteIndex(geometry: readonly Coordinate[]): RouteIndex {
  const latRad = new Float64Array(geometry.length);
  const lonRad = new Float64Array(geometry.length);
  const cosLat = new Float64Array(geometry.length);
  geometry.forEach(({ lat, lon }, i) => {
    latRad[i] = degreesToRadians(lat);
    lonRad[i] = degreesToRadians(lon);
    cosLat[i] = Math.cos(latRad[i]!);
  });
  return { latRad, lonRad, cosLat };
}

export type NearestWaypoint = { index: number; distanceMiles: number };

function nearestIndexed(index: RouteIndex, lat: number, lon: number): NearestWaypoint {
  const pLat = degreesToRadians(lat);
  const pLon = degreesToRadians(lon);
  const cosP = Math.cos(pLat);

  let best = 0;
  let bestDistance = Infinity;
  for (let i = 0; i < index.latRad.length; i += 1) {
    const dPhi = index.latRad[i]! - pLat;
    const dLambda = index.lonRad[i]! - pLon;
    const h = Math.sin(dPhi / 2) ** 2 + cosP * index.cosLat[i]! * Math.sin(dLambda / 2) ** 2;
    const distance = 2 * EARTH_RADIUS_MILES * Math.asin(Math.sqrt(Math.min(1, Math.max(0, h))));
    // strict comparison keeps the first waypoint on ties
    if (distance < bestDistance) {
      bestDistance = distance;
      best = i;
    }
  }
  return { index: best, distanceMiles: bestDistance };
}

/** Closest route waypoint to a point, by great-circle distance. */
export function nearestWaypoint(geometry: readonly Coordinate[], lat: number, lon: number): NearestWaypoint {
  return nearestIndexed(buildRouteIndex(geometry), lat, lon);
}

/**
 * Places every station inside the route corridor at its nearest waypoint.
 * Stations whose round-trip detour exceeds `maxDetourMiles` are dropped, as are
 * stations without usable coordinates or price. The result is ordered by route mile.
 */
export function projectStations(
  geometry: readonly Coordinate[],
  stations: readonly StationRecord[],
  options: Partial<ProjectionOptions> = {},
): ProjectedStop[] {
  const opts = { ...DEFAULT_PROJECTION_OPTIONS, ...options };
  const profile = buildDistanceProfile(geometry);
  if (stations.length === 0) return [];

  const bounds = computeCorridorBounds(geometry, opts.corridorMiles);
  const routeIndex = buildRouteIndex(geometry);
  const projected: ProjectedStop[] = [];

  for (const station of stations) {
    const { latitude, longitude, price_per_gallon: price } = station;
    if (latitude === null || longitude === null) continue;
    if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) continue;
    if (!Number.isFinite(price)) continue;
    if (!withinBounds(latitude, longitude, bounds)) continue;

    const nearest = nearestIndexed(routeIndex, latitude, longitude);
    const detourMiles = 2 * nearest.distanceMiles;
    if (detourMiles > opts.maxDetourMiles) continue;

    projected.push({
      station_id: station.id,
      name: station.name,
      route_mile: profile[nearest.index]!,
      price,
      latitude,
      longitude,
      distance_to_route: nearest.distanceMiles,
      detour_miles: detourMiles,
      on_route: nearest.distanceMiles < opts.onRouteThresholdMiles,
    });
  }

  projected.sort((a, b) => a.route_mile - b.route_mile);
  return projected;
}
