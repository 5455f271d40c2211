import { describe, expect, it } from "vitest";
import { classifyAvailability, computeAvailabilityRate } from "../../workers/shared/src";

describe("computeAvailabilityRate", () => {
  it("rounds to one decimal place", () => {
    expect(computeAvailabilityRate(3, 10)).toBe(30);
    expect(computeAvailabilityRate(1, 3)).toBe(33.3);
    expect(computeAvailabilityRate(2, 3)).toBe(66.7);
  });

  it("rounds exact halves to the even neighbour", () => {
    expect(computeAvailabilityRate(1, 16)).toBe(6.2);
    expect(computeAvailabilityRate(5, 16)).toBe(31.2);
    expect(computeAvailabilityRate(3, 16)).toBe(18.8);
    expect(computeAvailabilityRate(1, 32)).toBe(3.1);
  });

  it("is zero when capacity is zero, negative or not a number", () => {
    expect(computeAvailabilityRate(5, 0)).toBe(0);
    expect(computeAvailabilityRate(5, -2)).toBe(0);
    expect(computeAvailabilityRate(5, Number.NaN)).toBe(0);
  });

  it("is zero for an empty station", () => {
    expect(computeAvailabilityRate(0, 20)).toBe(0);
  });
});

describe("classifyAvailability", () => {
  it("marks empty and full stations critical regardless of rate", () => {
    expect(classifyAvailability({ bikes: 0, docks: 10, rate: 0 })).toBe("critical");
    expect(classifyAvailability({ bikes: 10, docks: 0, rate: 100 })).toBe("critical");
    expect(classifyAvailability({ bikes: 10, docks: 0, rate: 50 })).toBe("critical");
  });

  it("applies the rate thresholds at their boundaries", () => {
    expect(classifyAvailability({ bikes: 1, docks: 9, rate: 14.9 })).toBe("critical");
    expect(classifyAvailability({ bikes: 3, docks: 17, rate: 15 })).toBe("warning");
    expect(classifyAvailability({ bikes: 4, docks: 6, rate: 39.9 })).toBe("warning");
    expect(classifyAvailability({ bikes: 4, docks: 6, rate: 40 })).toBe("good");
    expect(classifyAvailability({ bikes: 7, docks: 3, rate: 70 })).toBe("good");
    expect(classifyAvailability({ bikes: 8, docks: 2, rate: 70.1 })).toBe("excellent");
  });
});
