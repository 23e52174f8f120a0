import { config } from '../config.js';
import { pool } from '../db.js';
import { StationLoadError, toErrorMessage } from '../errors.js';
import { fingerprintStations } from '../fingerprint.js';
import { createLogger } from '../logger.js';
import type { StationRecord } from '../types/station.js';
import { CsvStationSource, PgStationSource, type StationSource } from './sources.js';

const log = createLogger('stations');

type StationSnapshot = {
  stations: readonly StationRecord[];
  hash: string;
  loadedAt: Date;
};

export type StationCatalogue = {
  stations: StationRecord[];
  hash: string;
  loadedAt: Date;
};

/**
 * Lazily loaded, shared snapshot of the station catalogue.
 *
 * The first access starts a single load that every concurrent caller awaits.
 * A failed load is not remembered: the next access tries again.
 */
export class StationRepository {
  private snapshot: StationSnapshot | null = null;
  private loading: Promise<StationSnapshot> | null = null;
  // Bumped by invalidate() so a load that started earlier cannot install a stale snapshot.
  private generation = 0;

  constructor(private readonly source: StationSource) {}

  /** Catalogue copy and fingerprint taken from the same snapshot. */
  async getSnapshot(): Promise<StationCatalogue> {
    const snapshot = await this.ensureLoaded();
    return {
      stations: snapshot.stations.map((station) => ({ ...station })),
      hash: snapshot.hash,
      loadedAt: snapshot.loadedAt,
    };
  }

  /** A copy of the catalogue; callers may mutate it freely. */
  async getStations(): Promise<StationRecord[]> {
    const snapshot = await this.ensureLoaded();
    return snapshot.stations.map((station) => ({ ...station }));
  }

  async getStationsHash(): Promise<string> {
    const snapshot = await this.ensureLoaded();
    return snapshot.hash;
  }

  async getLoadedAt(): Promise<Date> {
    const snapshot = await this.ensureLoaded();
    return snapshot.loadedAt;
  }

  invalidate(): void {
    this.generation += 1;
    this.snapshot = null;
    this.loading = null;
    log.info({ source: this.source.description }, 'Station snapshot invalidated');
  }

  private ensureLoaded(): Promise<StationSnapshot> {
    if (this.snapshot) return Promise.resolve(this.snapshot);
    if (this.loading) return this.loading;

    const generation = this.generation;
    const loading = this.load().then(
      (snapshot) => {
        if (generation === this.generation) {
          this.snapshot = snapshot;
          this.loading = null;
        }
        return snapshot;
      },
      (error: unknown) => {
        if (generation === this.generation) {
          this.loading = null;
        }
        throw error;
      },
    );
    this.loading = loading;
    return loading;
  }

  private async load(): Promise<StationSnapshot> {
    let stations: StationRecord[];
    try {
      stations = await this.source.load();
    } catch (error) {
      log.error({ err: error, source: this.source.description }, 'Failed to load fuel stations');
      throw new StationLoadError(
        `Failed to load fuel stations from ${this.source.description}: ${toErrorMessage(error)}`,
        { cause: error },
      );
    }

    const snapshot: StationSnapshot = {
      stations: Object.freeze(stations),
      hash: fingerprintStations(stations),
      loadedAt: new Date(),
    };
    log.info({ count: stations.length, source: this.source.description }, 'Loaded fuel stations');
    return snapshot;
  }
}

export function createStationSource(): StationSource {
  return config.stations.source === 'postgres'
    ? new PgStationSource(pool)
    : new CsvStationSource(config.stations.csvPath);
}

let sharedRepository: StationRepository | null = null;

/** The process-wide repository, built from configuration on first use. */
export function getStationRepository(): StationRepository {
  if (!sharedRepository) {
    sharedRepository = new StationRepository(createStationSource());
  }
  return sharedRepository;
}
