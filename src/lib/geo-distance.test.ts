import { describe, it, expect } from "vitest";
import {
  EARTH_RADIUS_KM,
  calculateDistance,
  createCoordinates,
  formatCoordinates,
  pathLength,
} from "./geo-distance";

const KM_PER_DEGREE = (Math.PI / 180) * EARTH_RADIUS_KM;

describe("calculateDistance", () => {
  const lisbon = createCoordinates(38.7223, -9.1393);
  const porto = createCoordinates(41.1579, -8.6291);

  it("is zero for identical points", () => {
    expect(calculateDistance(lisbon, lisbon)).toBe(0);
  });

  it("is symmetric", () => {
    expect(calculateDistance(lisbon, porto)).toBeCloseTo(calculateDistance(porto, lisbon), 10);
  });

  it("measures one degree along a meridian as radius times one degree in radians", () => {
    const a = createCoordinates(10, 20);
    const b = createCoordinates(11, 20);
    expect(calculateDistance(a, b)).toBeCloseTo(KM_PER_DEGREE, 6);
    expect(calculateDistance(a, b)).toBeCloseTo(111.1984, 3);
  });

  it("gives half the circumference for antipodal points", () => {
    const a = createCoordinates(0, 0);
    const b = createCoordinates(0, 180);
    expect(calculateDistance(a, b)).toBeCloseTo(Math.PI * EARTH_RADIUS_KM, 6);
  });
});

describe("createCoordinates", () => {
  it("accepts the range bounds", () => {
    expect(createCoordinates(-90, 180)).toEqual({ latitude: -90, longitude: 180 });
  });

  it("rejects an out-of-range latitude", () => {
    expect(() => createCoordinates(90.5, 0)).toThrow(
      "The latitude of the coordinate point must be between -90 and 90 degrees."
    );
  });

  it("rejects an out-of-range longitude", () => {
    expect(() => createCoordinates(0, -181)).toThrow(
      "The longitude of the coordinate point must be between -180 and 180 degrees."
    );
  });

  it("returns a frozen value", () => {
    expect(Object.isFrozen(createCoordinates(1, 2))).toBe(true);
  });
});

describe("formatCoordinates", () => {
  it("renders lat,lng", () => {
    expect(formatCoordinates(createCoordinates(38.7, -9.14))).toBe("38.7,-9.14");
  });
});

describe("pathLength", () => {
  it("sums consecutive legs", () => {
    const points = [createCoordinates(0, 0), createCoordinates(1, 0), createCoordinates(2, 0)];
    expect(pathLength(points)).toBeCloseTo(2 * KM_PER_DEGREE, 6);
  });

  it("is zero for fewer than two points", () => {
    expect(pathLength([])).toBe(0);
    expect(pathLength([createCoordinates(5, 5)])).toBe(0);
  });
});
