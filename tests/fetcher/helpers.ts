import type { FetchLike } from "../../workers/fetcher/src/feed";
import type { Row, StationStore } from "../../workers/fetcher/src/store";

export interface StoreCall {
  kind: "insert" | "upsert";
  table: string;
  rows: Row[];
  onConflict?: string;
}

export function createFakeStore(failOnCall?: number): StationStore & { calls: StoreCall[] } {
  const calls: StoreCall[] = [];

  function record(call: StoreCall): Promise<void> {
    calls.push(call);
    if (failOnCall !== undefined && calls.length === failOnCall) {
      return Promise.reject(new Error("connection reset"));
    }
    return Promise.resolve();
  }

  return {
    calls,
    insertRows: (table, rows) => record({ kind: "insert", table, rows }),
    upsertRows: (table, rows, onConflict) => record({ kind: "upsert", table, rows, onConflict }),
  };
}

export function envelope(stations: unknown[]): unknown {
  return { last_updated: 1760774400, ttl: 60, data: { stations } };
}

export function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function createFakeFetch(routes: Record<string, () => Response>): FetchLike & { urls: string[] } {
  const urls: string[] = [];
  const fakeFetch = async (input: string): Promise<Response> => {
    urls.push(input);
    const route = routes[input];
    if (!route) {
      throw new TypeError(`fetch failed: no route for ${input}`);
    }
    return route();
  };
  return Object.assign(fakeFetch, { urls });
}
