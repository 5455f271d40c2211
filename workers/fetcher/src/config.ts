import { isStationIdPolicy } from "../../shared/src";
import type { StationIdPolicy } from "../../shared/src";

export type StorageMode = "split" | "single";

export interface CollectorEnv {
  SUPABASE_URL?: string;
  SUPABASE_KEY?: string;
  GBFS_BASE_URL?: string;
  FETCH_TIMEOUT_MS?: string;
  STORAGE_MODE?: string;
  STATION_ID_POLICY?: string;
  SNAPSHOT_PATH?: string;
  STATIONS_TABLE?: string;
  METADATA_TABLE?: string;
  OBSERVATIONS_TABLE?: string;
}

export interface CollectorConfig {
  supabaseUrl: string;
  supabaseKey: string;
  statusUrl: string;
  infoUrl: string;
  fetchTimeoutMs: number;
  storageMode: StorageMode;
  stationIdPolicy: StationIdPolicy;
  snapshotPath: string;
  tables: {
    stations: string;
    metadata: string;
    observations: string;
  };
}

export const DEFAULT_GBFS_BASE_URL = "https://transport.data.gouv.fr/gbfs/marseille";
export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;
export const DEFAULT_SNAPSHOT_PATH = "data/levelo_data.json";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: CollectorEnv = process.env): CollectorConfig {
  const supabaseUrl = env.SUPABASE_URL?.trim();
  const supabaseKey = env.SUPABASE_KEY?.trim();

  if (!supabaseUrl || !supabaseKey) {
    throw new ConfigError("SUPABASE_URL and SUPABASE_KEY environment variables are required.");
  }

  const baseUrl = trimTrailingSlashes(env.GBFS_BASE_URL?.trim() || DEFAULT_GBFS_BASE_URL);

  return {
    supabaseUrl,
    supabaseKey,
    statusUrl: `${baseUrl}/station_status.json`,
    infoUrl: `${baseUrl}/station_information.json`,
    fetchTimeoutMs: resolveFetchTimeout(env.FETCH_TIMEOUT_MS),
    storageMode: resolveStorageMode(env.STORAGE_MODE),
    stationIdPolicy: resolveStationIdPolicy(env.STATION_ID_POLICY),
    snapshotPath: env.SNAPSHOT_PATH?.trim() || DEFAULT_SNAPSHOT_PATH,
    tables: {
      stations: env.STATIONS_TABLE?.trim() || "stations",
      metadata: env.METADATA_TABLE?.trim() || "stations_metadata",
      observations: env.OBSERVATIONS_TABLE?.trim() || "levelo_observations",
    },
  };
}

function resolveFetchTimeout(rawValue: string | undefined): number {
  const parsed = Number.parseInt(String(rawValue ?? ""), 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return DEFAULT_FETCH_TIMEOUT_MS;
  }
  return parsed;
}

function resolveStorageMode(rawValue: string | undefined): StorageMode {
  const value = rawValue?.trim().toLowerCase();
  if (!value) {
    return "split";
  }
  if (value === "split" || value === "single") {
    return value;
  }
  console.warn(`Unknown STORAGE_MODE "${rawValue}"; falling back to split.`);
  return "split";
}

function resolveStationIdPolicy(rawValue: string | undefined): StationIdPolicy {
  const value = rawValue?.trim().toLowerCase();
  if (!value) {
    return "hash";
  }
  if (isStationIdPolicy(value)) {
    return value;
  }
  console.warn(`Unknown STATION_ID_POLICY "${rawValue}"; falling back to hash.`);
  return "hash";
}

function trimTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, "");
}
