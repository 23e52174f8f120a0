import { OutOfFuelError } from '../errors.js';
import type { FuelStop, ProjectedStop } from '../types/route.js';

/** Tolerance for every fuel and range comparison in the optimizer. */
export const FUEL_EPSILON = 1e-6;

export const DESTINATION_NAME = 'DESTINATION';

export type VehicleProfile = {
  /** Distance a full tank covers. */
  maxRangeMiles: number;
  milesPerGallon: number;
};

export const DEFAULT_VEHICLE: VehicleProfile = {
  maxRangeMiles: 500,
  milesPerGallon: 10,
};

export type FuelState = {
  /** Fuel on board, in miles of range. */
  fuel: number;
  /** Position along the route, in route miles. */
  pos: number;
  totalCost: number;
};

/** Anything the lookahead can aim for: a projected station or the destination. */
export type LookaheadTarget = Pick<ProjectedStop, 'name' | 'route_mile' | 'price' | 'detour_miles' | 'on_route'>;

export type FuelStep = {
  state: FuelState;
  stop: FuelStop | null;
};

export type FuelPlanResult = {
  stops: FuelStop[];
  totalCost: number;
};

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function detourFor(target: LookaheadTarget): number {
  return target.on_route ? 0 : target.detour_miles;
}

export function initialFuelState(vehicle: VehicleProfile = DEFAULT_VEHICLE): FuelState {
  return { fuel: vehicle.maxRangeMiles, pos: 0, totalCost: 0 };
}

/**
 * Stations in route order followed by the virtual destination, which has no
 * price and no detour and is only ever used as a lookahead target.
 */
export function buildLookaheadTargets(
  totalDistance: number,
  stations: readonly ProjectedStop[],
): { stations: ProjectedStop[]; targets: LookaheadTarget[] } {
  const ordered = [...stations].sort((a, b) => a.route_mile - b.route_mile);
  const destination: LookaheadTarget = {
    name: DESTINATION_NAME,
    route_mile: totalDistance,
    price: 0,
    detour_miles: 0,
    on_route: true,
  };
  return { stations: ordered, targets: [...ordered, destination] };
}

type Purchase = { miles: number; reason: string };

function decidePurchase(
  station: ProjectedStop,
  fuel: number,
  pos: number,
  detourNeeded: number,
  targets: readonly LookaheadTarget[],
  fromIndex: number,
  vehicle: VehicleProfile,
): Purchase | null {
  for (let j = fromIndex; j < targets.length; j += 1) {
    const target = targets[j]!;
    const reach = target.route_mile - pos + detourFor(target);
    if (reach > vehicle.maxRangeMiles + FUEL_EPSILON) break;

    if (target.price < station.price) {
      let requiredMiles = reach;
      if (detourNeeded > 0 && fuel < detourNeeded + FUEL_EPSILON) {
        requiredMiles += detourNeeded;
      }
      const missing = requiredMiles - fuel;
      return missing > FUEL_EPSILON
        ? { miles: missing, reason: `to reach cheaper station at ${target.name}` }
        : null;
    }
  }

  // Nothing cheaper in range: top off, leaving room for this station's own detour.
  const missing = vehicle.maxRangeMiles - detourNeeded - fuel;
  return missing > FUEL_EPSILON
    ? { miles: missing, reason: 'fill tank (no cheaper stations ahead)' }
    : null;
}

/**
 * Drives from `state.pos` to `station` and decides whether to buy there.
 * `targets[fromIndex..]` are the stations after this one plus the destination.
 */
export function stepFuelState(
  state: FuelState,
  station: ProjectedStop,
  targets: readonly LookaheadTarget[],
  fromIndex: number,
  vehicle: VehicleProfile = DEFAULT_VEHICLE,
): FuelStep {
  let fuel = state.fuel - (station.route_mile - state.pos);
  let pos = station.route_mile;

  if (fuel < -FUEL_EPSILON) {
    throw new OutOfFuelError(station.name, station.route_mile, -fuel);
  }
  fuel = Math.max(0, fuel);

  const detourNeeded = detourFor(station);
  if (detourNeeded > fuel + FUEL_EPSILON) {
    return { state: { ...state, fuel, pos }, stop: null };
  }

  const purchase = decidePurchase(station, fuel, pos, detourNeeded, targets, fromIndex, vehicle);
  const gallons = purchase ? purchase.miles / vehicle.milesPerGallon : 0;
  if (!purchase || gallons <= FUEL_EPSILON) {
    return { state: { ...state, fuel, pos }, stop: null };
  }

  const cost = gallons * station.price;
  // The detour is driven before filling up.
  fuel -= detourNeeded;
  pos += detourNeeded;
  fuel += gallons * vehicle.milesPerGallon;

  return {
    state: { fuel, pos, totalCost: state.totalCost + cost },
    stop: {
      ...station,
      gallons: roundTo(gallons, 4),
      cost: roundTo(cost, 2),
      detour_miles: roundTo(detourNeeded, 2),
      buy_reason: purchase.reason,
    },
  };
}

/**
 * Greedy forward planner: at each station, buy just enough to reach the next
 * cheaper station in range, or fill up when none is in range.
 *
 * @throws OutOfFuelError when a station or the destination cannot be reached.
 */
export function optimizeFuelStops(
  totalDistance: number,
  stations: readonly ProjectedStop[],
  vehicle: VehicleProfile = DEFAULT_VEHICLE,
): FuelPlanResult {
  const { stations: ordered, targets } = buildLookaheadTargets(totalDistance, stations);

  let state = initialFuelState(vehicle);
  const stops: FuelStop[] = [];

  ordered.forEach((station, i) => {
    const step = stepFuelState(state, station, targets, i + 1, vehicle);
    state = step.state;
    if (step.stop) stops.push(step.stop);
  });

  const arrivalFuel = state.fuel - (totalDistance - state.pos);
  if (arrivalFuel < -FUEL_EPSILON) {
    throw new OutOfFuelError(DESTINATION_NAME, totalDistance, -arrivalFuel);
  }

  return { stops, totalCost: roundTo(state.totalCost, 2) };
}
