import {
  classifyAvailability,
  computeAvailabilityRate,
  normalizeStationId,
  resolveZone,
  toIsoTimestamp,
} from "../../shared/src";
import type {
  DisplayStatus,
  RawFeedItem,
  SkipReason,
  StationIdPolicy,
  StationInfoFeedItem,
  StationRecord,
  StationResult,
  StationStatusFeedItem,
  ZoneBands,
  ZoneName,
} from "../../shared/src";
import type { FeedData } from "./feed";

export interface MergeOptions {
  idPolicy: StationIdPolicy;
  capturedAt: Date;
  zoneBands?: ZoneBands;
}

export interface SkippedStation {
  stationId: string;
  reason: SkipReason;
}

export interface MergeResult {
  records: StationRecord[];
  skipped: SkippedStation[];
}

export interface StationSummary {
  processed: number;
  skipped: number;
  skippedByReason: Record<SkipReason, number>;
  totalBikes: number;
  totalCapacity: number;
  criticalCount: number;
  displayStatusCounts: Record<DisplayStatus, number>;
  zoneCounts: Record<ZoneName, number>;
}

export function mergeStations(feeds: FeedData, options: MergeOptions): MergeResult {
  const infoById = new Map<string, RawFeedItem<StationInfoFeedItem>>();
  for (const info of feeds.info) {
    if (isFeedItem<StationInfoFeedItem>(info)) {
      infoById.set(stationKey(info.station_id), info);
    }
  }

  const timestamp = toIsoTimestamp(options.capturedAt);
  const records: StationRecord[] = [];
  const skipped: SkippedStation[] = [];

  feeds.status.forEach((status, index) => {
    if (!isFeedItem<StationStatusFeedItem>(status)) {
      skipped.push({ stationId: `status[${index}]`, reason: "invalid_record" });
      return;
    }

    const result = buildStationRecord(status, infoById.get(stationKey(status.station_id)), timestamp, options);
    if (result.ok) {
      records.push(result.record);
    } else {
      skipped.push({ stationId: result.stationId, reason: result.reason });
    }
  });

  return { records, skipped };
}

export function buildStationRecord(
  status: RawFeedItem<StationStatusFeedItem>,
  info: RawFeedItem<StationInfoFeedItem> | undefined,
  timestamp: string,
  options: Pick<MergeOptions, "idPolicy" | "zoneBands">,
): StationResult {
  const rawId = stationKey(status.station_id);

  if (!info) {
    return { ok: false, stationId: rawId, reason: "missing_station_info" };
  }

  const stationId = normalizeStationId(status.station_id, options.idPolicy);
  if (!stationId.ok) {
    return { ok: false, stationId: rawId, reason: "invalid_station_id" };
  }

  const bikes = safeNumber(status.num_bikes_available);
  const docks = safeNumber(status.num_docks_available);
  const capacity = safeNumber(info.capacity);
  const lat = safeNumber(info.lat);
  const rate = computeAvailabilityRate(bikes, capacity);

  return {
    ok: true,
    record: {
      station_id: stationId.value,
      name: String(info.name ?? "").trim(),
      address: String(info.address ?? "").trim(),
      lat,
      lon: safeNumber(info.lon),
      capacity,
      bikes_available: bikes,
      docks_available: docks,
      status: isRenting(status.is_renting) ? "active" : "inactive",
      availability_rate: rate,
      display_status: classifyAvailability({ bikes, docks, rate }),
      zone: resolveZone(lat, options.zoneBands),
      timestamp,
    },
  };
}

export function summarizeStations(records: StationRecord[], skipped: SkippedStation[]): StationSummary {
  const skippedByReason: Record<SkipReason, number> = {
    missing_station_info: 0,
    invalid_station_id: 0,
    invalid_record: 0,
  };
  for (const item of skipped) {
    skippedByReason[item.reason] += 1;
  }

  const displayStatusCounts: Record<DisplayStatus, number> = { critical: 0, warning: 0, good: 0, excellent: 0 };
  const zoneCounts: Record<ZoneName, number> = { "Nord Marseille": 0, "Centre Marseille": 0, "Sud Marseille": 0 };

  let totalBikes = 0;
  let totalCapacity = 0;
  for (const record of records) {
    totalBikes += record.bikes_available;
    totalCapacity += record.capacity;
    displayStatusCounts[record.display_status] += 1;
    zoneCounts[record.zone] += 1;
  }

  return {
    processed: records.length,
    skipped: skipped.length,
    skippedByReason,
    totalBikes,
    totalCapacity,
    criticalCount: displayStatusCounts.critical,
    displayStatusCounts,
    zoneCounts,
  };
}

function isFeedItem<T>(value: unknown): value is RawFeedItem<T> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stationKey(value: unknown): string {
  return String(value ?? "").trim();
}

function isRenting(value: unknown): boolean {
  return value === true || value === 1;
}

function safeNumber(value: unknown): number {
  if (value === null || value === undefined) {
    return 0;
  }
  const numeric = Number(value);
  return Number.isFinite(numeric) ? numeric : 0;
}
