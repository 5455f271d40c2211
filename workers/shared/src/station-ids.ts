export type StationIdPolicy = "hash" | "reject";

export const STATION_ID_POLICIES: readonly StationIdPolicy[] = ["hash", "reject"];
export const STATION_ID_HASH_SPACE = 1_000_000;
export const NUMERIC_ID_PATTERN = /^[0-9]+$/;

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export type StationIdResult = { ok: true; value: number } | { ok: false };

export function normalizeStationId(rawValue: unknown, policy: StationIdPolicy): StationIdResult {
  if (typeof rawValue === "number") {
    if (Number.isSafeInteger(rawValue) && rawValue >= 0) {
      return { ok: true, value: rawValue };
    }
    if (policy === "reject" || !Number.isFinite(rawValue)) {
      return { ok: false };
    }
    return { ok: true, value: hashStationId(String(rawValue)) };
  }

  if (typeof rawValue !== "string") {
    return { ok: false };
  }

  const trimmed = rawValue.trim();
  if (!trimmed) {
    return { ok: false };
  }

  if (NUMERIC_ID_PATTERN.test(trimmed)) {
    const parsed = Number.parseInt(trimmed, 10);
    if (Number.isSafeInteger(parsed)) {
      return { ok: true, value: parsed };
    }
  }

  if (policy === "reject") {
    return { ok: false };
  }

  return { ok: true, value: hashStationId(trimmed) };
}

// FNV-1a over the UTF-8 bytes, folded into [0, STATION_ID_HASH_SPACE).
export function hashStationId(value: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of new TextEncoder().encode(value)) {
    hash ^= byte;
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash % STATION_ID_HASH_SPACE;
}

export function isStationIdPolicy(value: string): value is StationIdPolicy {
  return (STATION_ID_POLICIES as readonly string[]).includes(value);
}
