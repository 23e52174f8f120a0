export type Coordinate = {
  readonly lat: number;
  readonly lon: number;
};

export type ProjectedStop = {
  station_id: string;
  name: string;
  route_mile: number;
  price: number;
  latitude: number;
  longitude: number;
  distance_to_route: number;
  detour_miles: number;
  on_route: boolean;
};

export type FuelStop = ProjectedStop & {
  gallons: number;
  cost: number;
  buy_reason: string;
};

export type RoutePlan = {
  total_distance: number;
  stops: FuelStop[];
  total_fuel_cost: number;
  map_reference: string;
};

export type RoutePlanSummary = {
  number_of_stops: number;
  total_gallons: number;
  average_price: number;
  average_detour: number;
};
