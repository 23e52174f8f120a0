export type StationRecord = {
  id: string;
  name: string;
  // null when the source field was empty or not a number
  latitude: number | null;
  longitude: number | null;
  price_per_gallon: number;
  city: string | null;
  state: string | null;
};
