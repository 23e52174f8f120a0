import { describe, it, expect, vi, type Mock } from 'vitest';
import { StationLoadError } from '../errors.js';
import type { StationRecord } from '../types/station.js';
import { StationRepository } from './repository.js';
import type { StationSource } from './sources.js';

const stations: StationRecord[] = [
  { id: '7', name: 'Prairie Fuel', latitude: 39.1, longitude: -94.6, price_per_gallon: 3.159, city: 'Kansas City', state: 'MO' },
  { id: '9', name: 'Route 66 Stop', latitude: 35.2, longitude: -101.8, price_per_gallon: 2.999, city: 'Amarillo', state: 'TX' },
];

type FakeSource = StationSource & { load: Mock<() => Promise<StationRecord[]>> };

function fakeSource(load: () => Promise<StationRecord[]>): FakeSource {
  return { description: 'fake', load: vi.fn(load) };
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('StationRepository', () => {
  it('does not load until first accessed', () => {
    const source = fakeSource(async () => stations);
    new StationRepository(source);

    expect(source.load).not.toHaveBeenCalled();
  });

  it('returns stations and fingerprint from the same snapshot', async () => {
    const source = fakeSource(async () => stations);
    const repo = new StationRepository(source);

    const snapshot = await repo.getSnapshot();
    snapshot.stations[0]!.price_per_gallon = 9.99;

    expect(snapshot.stations).toHaveLength(2);
    expect(snapshot.hash).toBe(await repo.getStationsHash());
    expect((await repo.getStations())[0]?.price_per_gallon).toBe(3.159);
    expect(source.load).toHaveBeenCalledTimes(1);
  });

  it('shares one load between concurrent first callers', async () => {
    const gate = deferred<StationRecord[]>();
    const source = fakeSource(() => gate.promise);
    const repo = new StationRepository(source);

    const pending = Promise.all([repo.getStations(), repo.getStationsHash(), repo.getStations()]);
    gate.resolve(stations);
    const [first, hash, second] = await pending;

    expect(source.load).toHaveBeenCalledTimes(1);
    expect(first).toEqual(stations);
    expect(second).toEqual(stations);
    expect(hash).toMatch(/^[0-9a-f]{64}$/);
    await repo.getStations();
    expect(source.load).toHaveBeenCalledTimes(1);
  });

  it('hands out defensive copies', async () => {
    const repo = new StationRepository(fakeSource(async () => stations.map((s) => ({ ...s }))));

    const first = await repo.getStations();
    first[0]!.price_per_gallon = 0;
    first.pop();

    const second = await repo.getStations();
    expect(second).toHaveLength(2);
    expect(second[0]!.price_per_gallon).toBe(3.159);
  });

  it('fingerprints identical data identically and changed data differently', async () => {
    const a = new StationRepository(fakeSource(async () => stations.map((s) => ({ ...s }))));
    const b = new StationRepository(fakeSource(async () => stations.map((s) => ({ ...s }))));
    const changed = new StationRepository(
      fakeSource(async () => stations.map((s) => ({ ...s, price_per_gallon: s.price_per_gallon + 0.01 }))),
    );

    expect(await a.getStationsHash()).toBe(await b.getStationsHash());
    expect(await changed.getStationsHash()).not.toBe(await a.getStationsHash());
  });

  it('wraps load failures and retries on the next access', async () => {
    const source = fakeSource(async () => stations);
    source.load.mockRejectedValueOnce(new Error('ENOENT: no such file'));
    const repo = new StationRepository(source);

    const failure = repo.getStations();
    await expect(failure).rejects.toBeInstanceOf(StationLoadError);
    await expect(failure).rejects.toThrow('Failed to load fuel stations from fake: ENOENT: no such file');

    await expect(repo.getStations()).resolves.toHaveLength(2);
    expect(source.load).toHaveBeenCalledTimes(2);
  });

  it('keeps the original error as the cause', async () => {
    const cause = new Error('corrupt');
    const repo = new StationRepository(fakeSource(async () => {
      throw cause;
    }));

    const error = await repo.getStations().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StationLoadError);
    expect(error instanceof StationLoadError && error.cause).toBe(cause);
  });

  it('reloads after invalidation', async () => {
    let price = 3.0;
    const source = fakeSource(async () => [{ ...stations[0]!, price_per_gallon: price }]);
    const repo = new StationRepository(source);

    const before = await repo.getStationsHash();
    price = 3.5;
    repo.invalidate();
    const after = await repo.getStationsHash();

    expect(source.load).toHaveBeenCalledTimes(2);
    expect(after).not.toBe(before);
    expect((await repo.getStations())[0]!.price_per_gallon).toBe(3.5);
  });

  it('does not install a snapshot whose load started before invalidation', async () => {
    const stale = deferred<StationRecord[]>();
    const source = fakeSource(() => stale.promise);
    const repo = new StationRepository(source);

    const inFlight = repo.getStations();
    repo.invalidate();
    source.load.mockImplementation(async () => [stations[1]!]);
    stale.resolve(stations);
    await inFlight;

    const fresh = await repo.getStations();
    expect(fresh.map((s) => s.id)).toEqual(['9']);
    expect(source.load).toHaveBeenCalledTimes(2);
  });
});
