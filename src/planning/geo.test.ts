import { describe, it, expect } from 'vitest';
import { InvalidRouteGeometryError } from '../errors.js';
import { EARTH_RADIUS_MILES, buildDistanceProfile, haversineMiles, totalRouteMiles } from './geo.js';

const ONE_DEGREE_MILES = (EARTH_RADIUS_MILES * Math.PI) / 180;

describe('haversineMiles', () => {
  it('is zero for identical points', () => {
    expect(haversineMiles({ lat: 35.2, lon: -101.8 }, { lat: 35.2, lon: -101.8 })).toBe(0);
  });

  it('measures one degree of longitude along the equator', () => {
    expect(haversineMiles({ lat: 0, lon: 0 }, { lat: 0, lon: 1 })).toBeCloseTo(ONE_DEGREE_MILES, 6);
  });

  it('is symmetric', () => {
    const a = { lat: 41.88, lon: -87.63 };
    const b = { lat: 39.74, lon: -104.99 };
    expect(haversineMiles(a, b)).toBeCloseTo(haversineMiles(b, a), 9);
  });
});

describe('buildDistanceProfile', () => {
  it('accumulates segment lengths from zero', () => {
    const profile = buildDistanceProfile([
      { lat: 0, lon: 0 },
      { lat: 0, lon: 1 },
      { lat: 0, lon: 3 },
    ]);

    expect(profile).toHaveLength(3);
    expect(profile[0]).toBe(0);
    expect(profile[1]).toBeCloseTo(ONE_DEGREE_MILES, 6);
    expect(profile[2]).toBeCloseTo(3 * ONE_DEGREE_MILES, 6);
    expect(totalRouteMiles(profile)).toBe(profile[2]);
  });

  it('never decreases, including over repeated waypoints', () => {
    const profile = buildDistanceProfile([
      { lat: 39.1, lon: -94.6 },
      { lat: 39.1, lon: -94.6 },
      { lat: 38.6, lon: -90.2 },
      { lat: 39.8, lon: -86.2 },
      { lat: 39.96, lon: -83.0 },
    ]);

    for (let i = 1; i < profile.length; i += 1) {
      expect(profile[i]!).toBeGreaterThanOrEqual(profile[i - 1]!);
    }
    expect(profile[1]).toBe(0);
  });

  it('rejects a route with fewer than two waypoints', () => {
    expect(() => buildDistanceProfile([{ lat: 1, lon: 1 }])).toThrow(InvalidRouteGeometryError);
    expect(() => buildDistanceProfile([])).toThrow('Route geometry needs at least 2 waypoints, got 0');
  });

  it('rejects non-numeric waypoints', () => {
    expect(() => buildDistanceProfile([{ lat: 0, lon: 0 }, { lat: Number.NaN, lon: 1 }]))
      .toThrow('Route waypoint 1 has a non-numeric coordinate');
  });
});
