import { formatRunBanner } from "../../shared/src";
import type { CollectorConfig, StorageMode } from "./config";
import { fetchFeeds } from "./feed";
import type { FetchLike } from "./feed";
import { mergeStations, summarizeStations } from "./merge";
import type { StationSummary } from "./merge";
import { exportSnapshot } from "./snapshot";
import type { SnapshotWriter } from "./snapshot";
import { persistStations } from "./store";
import type { PersistResult, StationStore } from "./store";

export type RunStage = "fetch" | "process" | "persist";

export type RunOutcome =
  | { ok: false; stage: RunStage; message: string }
  | { ok: true; summary: StationSummary; persisted: PersistResult; exported: boolean };

export interface RunDependencies {
  store: StationStore;
  fetchImpl?: FetchLike;
  now?: () => Date;
  writeSnapshot?: SnapshotWriter;
}

export async function runCollection(config: CollectorConfig, deps: RunDependencies): Promise<RunOutcome> {
  const now = deps.now ?? (() => new Date());
  const writeSnapshot = deps.writeSnapshot ?? exportSnapshot;
  const startedAt = Date.now();

  console.log(JSON.stringify({ event: "collection_started", at: formatRunBanner(now()) }));

  const feeds = await fetchFeeds(config, deps.fetchImpl);
  if (!feeds) {
    return fail("fetch", "Feed fetch failed; no stations retrieved.");
  }

  const { records, skipped } = mergeStations(feeds, {
    idPolicy: config.stationIdPolicy,
    capturedAt: now(),
  });

  for (const item of skipped) {
    console.warn(`Skipped station ${item.stationId}: ${item.reason}`);
  }

  if (records.length === 0) {
    return fail("process", `No stations could be processed (${skipped.length} skipped).`);
  }

  let persisted: PersistResult;
  try {
    persisted = await persistStations(deps.store, records, {
      mode: config.storageMode,
      tables: config.tables,
    });
  } catch (error) {
    return fail("persist", describeError(error, config.storageMode));
  }

  const exported = await writeSnapshot(records, config.snapshotPath);
  if (!exported) {
    console.warn("Snapshot export failed; stored data is unaffected.");
  }

  const summary = summarizeStations(records, skipped);

  console.log(
    JSON.stringify({
      event: "collection_complete",
      ...summary,
      storageMode: persisted.mode,
      writeBatches: persisted.batches,
      exported,
      durationMs: Date.now() - startedAt,
    }),
  );

  return { ok: true, summary, persisted, exported };
}

function fail(stage: RunStage, message: string): RunOutcome {
  console.error(JSON.stringify({ event: "collection_failed", stage, message }));
  return { ok: false, stage, message };
}

function describeError(error: unknown, mode: StorageMode): string {
  const detail = error instanceof Error ? error.message : String(error);
  return `Persisting stations (${mode} mode) failed: ${detail}`;
}
