import { InvalidRouteGeometryError } from '../errors.js';
import type { Coordinate } from '../types/route.js';

export const EARTH_RADIUS_MILES = 3958.8;
export const MILES_PER_DEGREE = 69.0;

export function degreesToRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function haversineMiles(a: Coordinate, b: Coordinate): number {
  const phi1 = degreesToRadians(a.lat);
  const phi2 = degreesToRadians(b.lat);
  const dPhi = degreesToRadians(b.lat - a.lat);
  const dLambda = degreesToRadians(b.lon - a.lon);

  const h = Math.sin(dPhi / 2) ** 2
    + Math.cos(phi1) * Math.cos(phi2) * Math.sin(dLambda / 2) ** 2;
  const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
  return EARTH_RADIUS_MILES * c;
}

/**
 * Cumulative great-circle distance from the first waypoint to each waypoint.
 * The result has one entry per waypoint and starts at 0.
 */
export function buildDistanceProfile(geometry: readonly Coordinate[]): number[] {
  if (geometry.length < 2) {
    throw new InvalidRouteGeometryError(
      `Route geometry needs at least 2 waypoints, got ${geometry.length}`,
      geometry.length,
    );
  }

  const badIndex = geometry.findIndex((p) => !Number.isFinite(p.lat) || !Number.isFinite(p.lon));
  if (badIndex !== -1) {
    throw new InvalidRouteGeometryError(
      `Route waypoint ${badIndex} has a non-numeric coordinate`,
      geometry.length,
    );
  }

  const profile = [0];
  for (let i = 1; i < geometry.length; i += 1) {
    profile.push(profile[i - 1]! + haversineMiles(geometry[i - 1]!, geometry[i]!));
  }
  return profile;
}

export function totalRouteMiles(profile: readonly number[]): number {
  return profile[profile.length - 1] ?? 0;
}
