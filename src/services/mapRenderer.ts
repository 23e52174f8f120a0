import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { config } from '../config.js';
import { MapRenderError, toErrorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { buildDistanceProfile, totalRouteMiles } from '../planning/geo.js';
import { nearestWaypoint } from '../planning/stationProjector.js';
import type { Coordinate, FuelStop } from '../types/route.js';

const log = createLogger('map');

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DEFAULT_TEMPLATE_PATH = path.resolve(__dirname, '..', '..', 'templates', 'route-map.html');
const DATA_PLACEHOLDER = '/*__MAP_DATA__*/null';

export interface MapRenderer {
  /** Renders the route and its stops; resolves to a reference the caller can hand back to clients. */
  render(route: readonly Coordinate[], stops: readonly FuelStop[], key: string): Promise<string>;
}

type LatLng = [number, number];

export type MapStopData = {
  index: number;
  name: string;
  price: number;
  gallons: number;
  cost: number;
  routeMile: number;
  detourMiles: number;
  distanceToRoute: number;
  buyReason: string;
  lat: number;
  lon: number;
  detourPoint: LatLng | null;
};

export type MapData = {
  route: LatLng[];
  totalDistance: number;
  stops: MapStopData[];
};

export function mapFileName(key: string): string {
  return `route_map_${key.replace(/[^A-Za-z0-9_.-]/g, '_')}.html`;
}

export function buildMapData(route: readonly Coordinate[], stops: readonly FuelStop[]): MapData {
  return {
    route: route.map((point): LatLng => [point.lat, point.lon]),
    totalDistance: totalRouteMiles(buildDistanceProfile(route)),
    stops: stops.map((stop, i) => {
      let detourPoint: LatLng | null = null;
      if (stop.detour_miles > 0) {
        const nearest = nearestWaypoint(route, stop.latitude, stop.longitude);
        const waypoint = route[nearest.index];
        if (waypoint) detourPoint = [waypoint.lat, waypoint.lon];
      }
      return {
        index: i + 1,
        name: stop.name,
        price: stop.price,
        gallons: stop.gallons,
        cost: stop.cost,
        routeMile: stop.route_mile,
        detourMiles: stop.detour_miles,
        distanceToRoute: stop.distance_to_route,
        buyReason: stop.buy_reason,
        lat: stop.latitude,
        lon: stop.longitude,
        detourPoint,
      };
    }),
  };
}

// `<` is escaped so station names can never close the surrounding <script>.
export function embedMapData(template: string, data: MapData): string {
  if (!template.includes(DATA_PLACEHOLDER)) {
    throw new Error(`Map template has no ${DATA_PLACEHOLDER} placeholder`);
  }
  const json = JSON.stringify(data).replace(/</g, '\\u003c');
  return template.replace(DATA_PLACEHOLDER, () => json);
}

export type HtmlMapRendererOptions = {
  outputDir: string;
  templatePath: string;
};

/** Writes a standalone Leaflet page per plan into `outputDir`. */
export class HtmlMapRenderer implements MapRenderer {
  private readonly options: HtmlMapRendererOptions;
  private templatePromise: Promise<string> | null = null;

  constructor(options: Partial<HtmlMapRendererOptions> = {}) {
    this.options = {
      outputDir: options.outputDir ?? config.maps.outputDir,
      templatePath: options.templatePath ?? DEFAULT_TEMPLATE_PATH,
    };
  }

  async render(route: readonly Coordinate[], stops: readonly FuelStop[], key: string): Promise<string> {
    const filePath = path.join(this.options.outputDir, mapFileName(key));
    try {
      const template = await this.loadTemplate();
      const html = embedMapData(template, buildMapData(route, stops));
      await fs.mkdir(this.options.outputDir, { recursive: true });
      await fs.writeFile(filePath, html, 'utf8');
    } catch (error) {
      throw new MapRenderError(`Failed to render route map: ${toErrorMessage(error)}`, { cause: error });
    }
    log.debug({ filePath, stops: stops.length }, 'Route map written');
    return filePath;
  }

  private loadTemplate(): Promise<string> {
    if (!this.templatePromise) {
      this.templatePromise = fs.readFile(this.options.templatePath, 'utf8').catch((error: unknown) => {
        this.templatePromise = null;
        throw error;
      });
    }
    return this.templatePromise;
  }
}
