import { describe, expect, it } from "vitest";
import { STATION_ID_HASH_SPACE, hashStationId, normalizeStationId } from "../../workers/shared/src";

describe("normalizeStationId", () => {
  it("keeps numeric identifiers", () => {
    expect(normalizeStationId(42, "reject")).toEqual({ ok: true, value: 42 });
    expect(normalizeStationId("42", "reject")).toEqual({ ok: true, value: 42 });
    expect(normalizeStationId(" 7 ", "hash")).toEqual({ ok: true, value: 7 });
  });

  it("hashes non-numeric identifiers deterministically", () => {
    const first = normalizeStationId("MRS-cours-julien", "hash");
    const second = normalizeStationId("MRS-cours-julien", "hash");

    expect(first).toEqual(second);
    expect(first).toEqual({ ok: true, value: hashStationId("MRS-cours-julien") });
    if (first.ok) {
      expect(Number.isInteger(first.value)).toBe(true);
      expect(first.value).toBeGreaterThanOrEqual(0);
      expect(first.value).toBeLessThan(STATION_ID_HASH_SPACE);
    }
  });

  it("rejects non-numeric identifiers under the reject policy", () => {
    expect(normalizeStationId("MRS-cours-julien", "reject")).toEqual({ ok: false });
  });

  it("treats negative and fractional numbers like their string form", () => {
    expect(normalizeStationId(-1, "hash")).toEqual(normalizeStationId("-1", "hash"));
    expect(normalizeStationId(1.5, "hash")).toEqual({ ok: true, value: hashStationId("1.5") });
    expect(normalizeStationId(-1, "reject")).toEqual({ ok: false });
    expect(normalizeStationId(1.5, "reject")).toEqual({ ok: false });
  });

  it("rejects values that cannot be identifiers", () => {
    expect(normalizeStationId("", "hash")).toEqual({ ok: false });
    expect(normalizeStationId("   ", "hash")).toEqual({ ok: false });
    expect(normalizeStationId(Number.NaN, "hash")).toEqual({ ok: false });
    expect(normalizeStationId(null, "hash")).toEqual({ ok: false });
  });
});
