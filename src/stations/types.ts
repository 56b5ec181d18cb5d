export type Station = {
  icao: string;
  iata: string | null;
  name: string | null;
  city: string | null;
  country: string | null;
  latitude: number;
  longitude: number;
  elevationFt: number | null;
  type: string | null;
  reporting: boolean;
};

export type StationDistance = {
  station: Station;
  kilometers: number;
  nauticalMiles: number;
};

export type StationIndexStatus = {
  loaded: boolean;
  count: number;
  loadedAt: string | null;
  source: string | null;
};

export interface StationSource {
  /** Human-readable origin, reported by the index status. */
  readonly description: string;
  listAllStations(): Promise<Station[]>;
}

export type Coordinate = {
  latitude: number;
  longitude: number;
};

export type LocationQuery =
  | { kind: 'code'; code: string }
  | { kind: 'coordinate'; coordinate: Coordinate };
