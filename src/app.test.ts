import type { Server } from 'node:http';
import { afterAll, beforeAll, beforeEach, describe, it, expect, vi } from 'vitest';
import { createApp } from './app.js';
import { RoutePlanningError } from './errors.js';
import { DEFAULT_VEHICLE } from './planning/fuelOptimizer.js';
import { DEFAULT_PROJECTION_OPTIONS } from './planning/stationProjector.js';
import { RouteProcessor } from './routeProcessor.js';
import { readCoordinate } from './routes/planRoute.js';
import { StationRepository } from './stations/repository.js';
import type { Coordinate } from './types/route.js';
import type { StationRecord } from './types/station.js';

const catalogue: StationRecord[] = [
  { id: '7', name: 'Midway Fuel', latitude: 0, longitude: 4, price_per_gallon: 3, city: null, state: null },
];

const getRoute = vi.fn(async (start: Coordinate, finish: Coordinate) => [start, { lat: 0, lon: 4 }, finish]);

const processor = new RouteProcessor({
  stations: new StationRepository({ description: 'fake', load: async () => catalogue }),
  routing: { getRoute },
  maps: { render: async () => '/maps/route_map_test.html' },
  cache: null,
  vehicle: DEFAULT_VEHICLE,
  projection: DEFAULT_PROJECTION_OPTIONS,
});

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  const app = createApp({
    processor,
    stations: new StationRepository({ description: 'fake', load: async () => catalogue }),
  });
  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('server is not listening on a port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
});

beforeEach(() => {
  getRoute.mockClear();
});

function postPlan(body: unknown): Promise<Response> {
  return fetch(`${baseUrl}/api/plan-route`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('readCoordinate', () => {
  it('reads strings and objects', () => {
    expect(readCoordinate('41.5, -87.25')).toEqual({ lat: 41.5, lon: -87.25 });
    expect(readCoordinate({ lat: '39.7', lng: -105 })).toEqual({ lat: 39.7, lon: -105 });
    expect(readCoordinate({ lat: 39.7, lon: -105 })).toEqual({ lat: 39.7, lon: -105 });
  });

  it('rejects malformed or out-of-range values', () => {
    expect(readCoordinate('Chicago, IL')).toBeNull();
    expect(readCoordinate('1,2,3')).toBeNull();
    expect(readCoordinate({ lat: 91, lon: 0 })).toBeNull();
    expect(readCoordinate({ lat: 10 })).toBeNull();
    expect(readCoordinate(42)).toBeNull();
  });
});

describe('POST /api/plan-route', () => {
  it('returns the plan with its summary', async () => {
    const res = await postPlan({ start: '0,0', finish: { lat: 0, lon: 8 } });

    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toMatchObject({
      start_location: { lat: 0, lon: 0 },
      finish_location: { lat: 0, lon: 8 },
      total_distance: 552.8,
      total_fuel_cost: 15.83,
      map_reference: '/maps/route_map_test.html',
      distance_unit: 'miles',
      summary: { number_of_stops: 1, total_gallons: 5.28, average_price: 3, average_detour: 0 },
    });
    expect(getRoute).toHaveBeenCalledWith({ lat: 0, lon: 0 }, { lat: 0, lon: 8 });
  });

  it('requires both endpoints', async () => {
    const res = await postPlan({ start: '0,0' });

    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toEqual({ error: 'start and finish are required' });
    expect(getRoute).not.toHaveBeenCalled();
  });

  it('rejects unreadable coordinates', async () => {
    const res = await postPlan({ start: '0,0', finish: 'Denver' });

    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toEqual({
      error: 'Could not read finish coordinate; expected "lat,lon" or { lat, lon }',
    });
  });

  it('maps an infeasible route to 422', async () => {
    const res = await postPlan({ start: '0,0', finish: '0,20' });

    expect(res.status).toBe(422);
    await expect(res.json()).resolves.toEqual({
      error: 'Failed to plan route',
      kind: 'out_of_fuel',
      detail: 'Failed to plan route: Out of fuel before reaching DESTINATION',
    });
  });

  it('maps routing failures to 502', async () => {
    const spy = vi.spyOn(processor, 'plan').mockRejectedValueOnce(
      new RoutePlanningError('routing_provider', 'Failed to plan route: OSRM request failed: fetch failed'),
    );

    const res = await postPlan({ start: '0,0', finish: '0,1' });

    expect(res.status).toBe(502);
    await expect(res.json()).resolves.toMatchObject({ kind: 'routing_provider' });
    spy.mockRestore();
  });

  it('answers invalid JSON with 400', async () => {
    const res = await fetch(`${baseUrl}/api/plan-route`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"start":',
    });

    expect(res.status).toBe(400);
    await expect(res.json()).resolves.toEqual({ error: 'Invalid JSON' });
  });
});

describe('GET /api/stations/stats', () => {
  it('reports the catalogue size and fingerprint', async () => {
    const res = await fetch(`${baseUrl}/api/stations/stats`);

    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toMatchObject({
      total: 1,
      fingerprint: expect.stringMatching(/^[0-9a-f]{64}$/),
    });
  });
});

describe('GET /api/health', () => {
  it('responds ok with security headers', async () => {
    const res = await fetch(`${baseUrl}/api/health`);

    expect(res.status).toBe(200);
    expect(res.headers.get('x-content-type-options')).toBe('nosniff');
    expect(res.headers.get('x-powered-by')).toBeNull();
    await expect(res.json()).resolves.toMatchObject({ status: 'ok' });
  });
});
