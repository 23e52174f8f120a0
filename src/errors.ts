export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return 'Unknown error';
}

export class InvalidRouteGeometryError extends Error {
  constructor(message: string, readonly pointCount: number) {
    super(message);
    this.name = 'InvalidRouteGeometryError';
  }
}

/** The vehicle cannot reach `stationName` from the last position with the fuel on board. */
export class OutOfFuelError extends Error {
  constructor(
    readonly stationName: string,
    readonly routeMile: number,
    readonly shortfallMiles: number,
  ) {
    super(`Out of fuel before reaching ${stationName}`);
    this.name = 'OutOfFuelError';
  }
}

export class StationLoadError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StationLoadError';
  }
}

export class RoutingProviderError extends Error {
  constructor(message: string, readonly status?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RoutingProviderError';
  }
}

export class MapRenderError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MapRenderError';
  }
}

export type RoutePlanningErrorKind =
  | 'invalid_route_geometry'
  | 'out_of_fuel'
  | 'station_load'
  | 'routing_provider'
  | 'map_render'
  | 'unexpected';

export class RoutePlanningError extends Error {
  constructor(readonly kind: RoutePlanningErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RoutePlanningError';
  }
}

export function classifyPlanningFailure(error: unknown): RoutePlanningErrorKind {
  if (error instanceof InvalidRouteGeometryError) return 'invalid_route_geometry';
  if (error instanceof OutOfFuelError) return 'out_of_fuel';
  if (error instanceof StationLoadError) return 'station_load';
  if (error instanceof RoutingProviderError) return 'routing_provider';
  if (error instanceof MapRenderError) return 'map_render';
  return 'unexpected';
}

export function toRoutePlanningError(error: unknown): RoutePlanningError {
  if (error instanceof RoutePlanningError) return error;
  return new RoutePlanningError(
    classifyPlanningFailure(error),
    `Failed to plan route: ${toErrorMessage(error)}`,
    { cause: error },
  );
}
