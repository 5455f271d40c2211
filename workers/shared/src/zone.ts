import type { ZoneName } from "./types";

export interface ZoneBands {
  north: number;
  centre: number;
}

export const DEFAULT_ZONE_BANDS: ZoneBands = {
  north: 43.3,
  centre: 43.28,
};

export function resolveZone(lat: number, bands: ZoneBands = DEFAULT_ZONE_BANDS): ZoneName {
  if (lat >= bands.north) {
    return "Nord Marseille";
  }
  if (lat >= bands.centre) {
    return "Centre Marseille";
  }
  return "Sud Marseille";
}
