import type { FeedEnvelope } from "../../shared/src";
import type { CollectorConfig } from "./config";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

// Items are raw feed entries; the merger checks and coerces each one.
export interface FeedData {
  status: unknown[];
  info: unknown[];
}

/**
 * Downloads station status and station information, in that order. Either
 * request failing (HTTP status, transport, timeout, body) fails the whole
 * fetch; no partial feed is returned.
 */
export async function fetchFeeds(
  config: Pick<CollectorConfig, "statusUrl" | "infoUrl" | "fetchTimeoutMs">,
  fetchImpl: FetchLike = fetch,
): Promise<FeedData | null> {
  console.log(JSON.stringify({ event: "feed_fetch_started", statusUrl: config.statusUrl, infoUrl: config.infoUrl }));

  const statusPayload = await fetchJson(fetchImpl, config.statusUrl, config.fetchTimeoutMs);
  if (statusPayload === null) {
    return null;
  }

  const infoPayload = await fetchJson(fetchImpl, config.infoUrl, config.fetchTimeoutMs);
  if (infoPayload === null) {
    return null;
  }

  const status = extractStations(statusPayload);
  const info = extractStations(infoPayload);

  if (!status) {
    console.warn(`Malformed feed payload from ${config.statusUrl}: missing data.stations array`);
    return null;
  }
  if (!info) {
    console.warn(`Malformed feed payload from ${config.infoUrl}: missing data.stations array`);
    return null;
  }

  console.log(
    JSON.stringify({ event: "feed_fetch_complete", statusCount: status.length, infoCount: info.length }),
  );

  return { status, info };
}

export function extractStations(payload: unknown): unknown[] | null {
  if (!isEnvelope(payload)) {
    return null;
  }
  return payload.data.stations;
}

function isEnvelope(payload: unknown): payload is FeedEnvelope<unknown> {
  if (typeof payload !== "object" || payload === null || !("data" in payload)) {
    return false;
  }
  const data: unknown = payload.data;
  if (typeof data !== "object" || data === null || !("stations" in data)) {
    return false;
  }
  return Array.isArray(data.stations);
}

async function fetchJson(fetchImpl: FetchLike, url: string, timeoutMs: number): Promise<unknown> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort("fetch-timeout"), timeoutMs);

  try {
    const response = await fetchImpl(url, {
      method: "GET",
      headers: { accept: "application/json" },
      signal: controller.signal,
    });

    if (!response.ok) {
      console.warn(`Non-2xx response from ${url}: ${response.status}`);
      return null;
    }

    const body: unknown = await response.json();
    return body;
  } catch (error) {
    console.warn(`Fetch failed for ${url}`, error);
    return null;
  } finally {
    clearTimeout(timeout);
  }
}
