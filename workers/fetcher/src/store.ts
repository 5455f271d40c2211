import type { SupabaseClient } from "@supabase/supabase-js";
import type { StationRecord } from "../../shared/src";
import type { CollectorConfig, StorageMode } from "./config";

export type RowValue = string | number | null;
export type Row = Record<string, RowValue>;

export interface StationStore {
  insertRows(table: string, rows: Row[]): Promise<void>;
  upsertRows(table: string, rows: Row[], onConflict: string): Promise<void>;
}

export interface PersistOptions {
  mode: StorageMode;
  tables: CollectorConfig["tables"];
  batchSize?: number;
}

export interface PersistResult {
  mode: StorageMode;
  batches: number;
  rows: number;
}

export const PERSIST_BATCH_SIZE = 50;

export class StoreWriteError extends Error {
  readonly table: string;

  constructor(table: string, message: string) {
    super(`Write to ${table} failed: ${message}`);
    this.name = "StoreWriteError";
    this.table = table;
  }
}

export function createSupabaseStore(client: SupabaseClient): StationStore {
  return {
    async insertRows(table, rows) {
      const { error } = await client.from(table).insert(rows);
      if (error) {
        throw new StoreWriteError(table, error.message);
      }
    },
    async upsertRows(table, rows, onConflict) {
      const { error } = await client.from(table).upsert(rows, { onConflict });
      if (error) {
        throw new StoreWriteError(table, error.message);
      }
    },
  };
}

/**
 * Writes one run's records. In split mode station metadata is upserted
 * before observations are appended, so every observation row has its parent.
 * The first failed batch throws and later batches are not attempted.
 */
export async function persistStations(
  store: StationStore,
  records: StationRecord[],
  options: PersistOptions,
): Promise<PersistResult> {
  const batchSize = options.batchSize ?? PERSIST_BATCH_SIZE;
  let batches = 0;

  if (records.length === 0) {
    return { mode: options.mode, batches, rows: 0 };
  }

  if (options.mode === "single") {
    for (const chunk of chunkArray(records.map(toStationRow), batchSize)) {
      await store.insertRows(options.tables.stations, chunk);
      batches += 1;
    }
    return { mode: options.mode, batches, rows: records.length };
  }

  for (const chunk of chunkArray(latestMetadataRows(records), batchSize)) {
    await store.upsertRows(options.tables.metadata, chunk, "station_id");
    batches += 1;
  }

  for (const chunk of chunkArray(records.map(toObservationRow), batchSize)) {
    await store.insertRows(options.tables.observations, chunk);
    batches += 1;
  }

  return { mode: options.mode, batches, rows: records.length };
}

// One upsert statement cannot touch the same key twice; the last record wins.
export function latestMetadataRows(records: StationRecord[]): Row[] {
  const rowsById = new Map<number, Row>();
  for (const record of records) {
    rowsById.set(record.station_id, toMetadataRow(record));
  }
  return [...rowsById.values()];
}

export function toStationRow(record: StationRecord): Row {
  return {
    station_id: record.station_id,
    name: record.name,
    address: record.address,
    lat: record.lat,
    lon: record.lon,
    capacity: record.capacity,
    bikes: record.bikes_available,
    docks: record.docks_available,
    status: record.status,
    display_status: record.display_status,
    availability_rate: record.availability_rate,
    zone: record.zone,
    timestamp: record.timestamp,
  };
}

export function toMetadataRow(record: StationRecord): Row {
  return {
    station_id: record.station_id,
    name: record.name,
    address: record.address,
    lat: record.lat,
    lon: record.lon,
    capacity: record.capacity,
    zone: record.zone,
    updated_at: record.timestamp,
  };
}

export function toObservationRow(record: StationRecord): Row {
  return {
    station_id: record.station_id,
    bikes: record.bikes_available,
    docks: record.docks_available,
    status: record.status,
    recorded_at: record.timestamp,
  };
}

export function chunkArray<T>(items: T[], chunkSize: number): T[][] {
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += chunkSize) {
    chunks.push(items.slice(index, index + chunkSize));
  }
  return chunks;
}
