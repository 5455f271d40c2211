export type GbfsStationId = string | number;

export interface StationStatusFeedItem {
  station_id: GbfsStationId;
  num_bikes_available?: number | null;
  num_docks_available?: number | null;
  is_renting?: boolean | number | null;
}

export interface StationInfoFeedItem {
  station_id: GbfsStationId;
  name?: string | null;
  address?: string | null;
  lat?: number | null;
  lon?: number | null;
  capacity?: number | null;
}

// A feed entry whose shape is known but whose field values are unchecked.
export type RawFeedItem<T> = { [K in keyof T]?: unknown };

export interface FeedEnvelope<T> {
  data: {
    stations: T[];
  };
}

export type DisplayStatus = "critical" | "warning" | "good" | "excellent";

export type OperationalStatus = "active" | "inactive";

export type ZoneName = "Nord Marseille" | "Centre Marseille" | "Sud Marseille";

export interface StationRecord {
  station_id: number;
  name: string;
  address: string;
  lat: number;
  lon: number;
  capacity: number;
  bikes_available: number;
  docks_available: number;
  status: OperationalStatus;
  availability_rate: number;
  display_status: DisplayStatus;
  zone: ZoneName;
  timestamp: string;
}

export type SkipReason = "missing_station_info" | "invalid_station_id" | "invalid_record";

export type StationResult =
  | { ok: true; record: StationRecord }
  | { ok: false; stationId: string; reason: SkipReason };
