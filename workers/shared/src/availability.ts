import type { DisplayStatus } from "./types";

export const CRITICAL_RATE_BELOW = 15;
export const WARNING_RATE_BELOW = 40;
export const EXCELLENT_RATE_ABOVE = 70;

export function computeAvailabilityRate(bikes: number, capacity: number): number {
  if (!Number.isFinite(capacity) || capacity <= 0 || !Number.isFinite(bikes)) {
    return 0;
  }
  const percentage = (bikes / capacity) * 100;
  return roundHalfToEven(percentage * 10) / 10;
}

// Exact halves go to the even neighbour: 6.25 -> 6.2, 6.35 -> 6.4.
function roundHalfToEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) {
    return floor + 1;
  }
  if (fraction < 0.5) {
    return floor;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Dashboard colour for a station. An empty or full station is always
 * critical, whatever its rate.
 */
export function classifyAvailability(input: { bikes: number; docks: number; rate: number }): DisplayStatus {
  if (input.bikes === 0 || input.docks === 0) {
    return "critical";
  }
  if (input.rate < CRITICAL_RATE_BELOW) {
    return "critical";
  }
  if (input.rate < WARNING_RATE_BELOW) {
    return "warning";
  }
  if (input.rate > EXCELLENT_RATE_ABOVE) {
    return "excellent";
  }
  return "good";
}
