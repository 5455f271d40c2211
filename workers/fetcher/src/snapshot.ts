import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { StationRecord } from "../../shared/src";

export type SnapshotWriter = (records: StationRecord[], path: string) => Promise<boolean>;

export function serializeSnapshot(records: StationRecord[]): string {
  return `${JSON.stringify(records, null, 2)}\n`;
}

export const exportSnapshot: SnapshotWriter = async (records, path) => {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, serializeSnapshot(records), "utf-8");
    console.log(JSON.stringify({ event: "snapshot_exported", path, stationCount: records.length }));
    return true;
  } catch (error) {
    console.error(`Snapshot export to ${path} failed`, error);
    return false;
  }
};
