import { describe, it, expect, beforeEach } from "vitest";
import type { ScheduledActivity } from "@/types/itinerary";
import type { Coordinates } from "@/types/places";
import {
  createMockActivity,
  FakeContentGenerationService,
  MOCK_DESTINATIONS,
  northOf,
  resetIdCounter,
} from "./__tests__/mock-factories";
import {
  calculateTravelSegments,
  classifyByDistance,
  DEFAULT_TRAVEL_SEGMENT_OPTIONS,
  describeTravel,
  fetchFareOptions,
} from "./travel-segments";

const base = MOCK_DESTINATIONS.lisbon;

beforeEach(() => {
  resetIdCounter();
});

describe("classifyByDistance", () => {
  it("walks short hops for free with a five minute floor", () => {
    expect(classifyByDistance(0.4, DEFAULT_TRAVEL_SEGMENT_OPTIONS)).toEqual({
      transportMode: "WALKING",
      durationMinutes: 5,
      cost: 0,
    });
  });

  it("takes public transport up to three kilometers", () => {
    expect(classifyByDistance(2, DEFAULT_TRAVEL_SEGMENT_OPTIONS)).toEqual({
      transportMode: "PUBLIC_TRANSPORT",
      durationMinutes: 16,
      cost: 2.5,
    });
  });

  it("takes a taxi beyond that", () => {
    expect(classifyByDistance(10, DEFAULT_TRAVEL_SEGMENT_OPTIONS)).toEqual({
      transportMode: "TAXI",
      durationMinutes: 50,
      cost: 13.5,
    });
  });

  it("applies the taxi floor of fifteen minutes", () => {
    expect(classifyByDistance(3.1, DEFAULT_TRAVEL_SEGMENT_OPTIONS).durationMinutes).toBe(15);
  });

  it("uses the given fares", () => {
    const options = { ...DEFAULT_TRAVEL_SEGMENT_OPTIONS, averagePublicTransportFare: 3, baseTaxiFare: 4 };
    expect(classifyByDistance(1, options).cost).toBe(3);
    expect(classifyByDistance(5, options).cost).toBeCloseTo(10, 10);
  });
});

describe("describeTravel", () => {
  const cases: [number, string][] = [
    [0.4, "Walk 400m to Castle (5 mins)"],
    [0.4567, "Walk 456m to Castle (5 mins)"],
    [2, "Take public transport to Castle (16 mins, €2.50)"],
    [10, "Take taxi to Castle (50 mins, ~€13.50)"],
  ];

  it.each(cases)("describes a %s km hop", (distanceKm, expected) => {
    const estimate = classifyByDistance(distanceKm, DEFAULT_TRAVEL_SEGMENT_OPTIONS);
    expect(describeTravel(estimate, distanceKm, "Castle", "€")).toBe(expected);
  });
});

describe("calculateTravelSegments", () => {
  function stop(id: string, name: string, coordinates: Coordinates | null, hhmm: string): ScheduledActivity {
    return createMockActivity({
      id,
      name,
      coordinates,
      startTime: new Date(`2031-05-02T${hhmm}:00.000Z`),
      endTime: new Date(`2031-05-02T${hhmm}:00.000Z`),
    });
  }

  it("links each pair of consecutive activities", () => {
    const segments = calculateTravelSegments([
      stop("a", "Cathedral", base, "09:00"),
      stop("b", "Castle", northOf(base, 0.4005), "11:00"),
      stop("c", "Market", northOf(base, 2.4505), "13:00"),
    ]);

    expect(segments).toEqual([
      {
        fromActivityId: "a",
        toActivityId: "b",
        transportMode: "WALKING",
        durationMinutes: 5,
        distanceKm: 0.4,
        cost: 0,
        instructions: "Walk 400m to Castle (5 mins)",
      },
      {
        fromActivityId: "b",
        toActivityId: "c",
        transportMode: "PUBLIC_TRANSPORT",
        durationMinutes: 16,
        distanceKm: 2.05,
        cost: 2.5,
        instructions: "Take public transport to Market (16 mins, €2.50)",
      },
    ]);
  });

  it("skips pairs with a missing location or the same start time", () => {
    const segments = calculateTravelSegments([
      stop("a", "Cathedral", base, "09:00"),
      stop("b", "Unknown", null, "10:00"),
      stop("c", "Castle", northOf(base, 0.4), "11:00"),
      stop("d", "Tram", northOf(base, 1), "11:00"),
    ]);
    expect(segments).toEqual([]);
  });

  it("returns nothing for fewer than two activities", () => {
    expect(calculateTravelSegments([])).toEqual([]);
    expect(calculateTravelSegments([stop("a", "Cathedral", base, "09:00")])).toEqual([]);
  });
});

describe("fetchFareOptions", () => {
  it("uses the fares from the content service", async () => {
    const service = new FakeContentGenerationService({
      travelFares: () => ({ averagePublicTransportFare: 3, baseTaxiFare: 2 }),
    });
    await expect(fetchFareOptions(service, "Lisbon", 1)).resolves.toEqual({
      averagePublicTransportFare: 3,
      baseTaxiFare: 2,
      currencySymbol: "€",
    });
    expect(service.callsFor("travelFares")[0].prompt).toContain("Destination: Lisbon");
  });

  it("falls back to the defaults when the service fails", async () => {
    const service = new FakeContentGenerationService({
      travelFares: () => {
        throw new Error("rate limited");
      },
    });
    await expect(fetchFareOptions(service, "Lisbon", 2)).resolves.toEqual(
      DEFAULT_TRAVEL_SEGMENT_OPTIONS
    );
    expect(service.callsFor("travelFares")).toHaveLength(2);
  });

  it("falls back to the defaults on an invalid response", async () => {
    const service = new FakeContentGenerationService({
      travelFares: () => ({ averagePublicTransportFare: -1, baseTaxiFare: 2 }),
    });
    await expect(fetchFareOptions(service, "Lisbon", 1)).resolves.toEqual(
      DEFAULT_TRAVEL_SEGMENT_OPTIONS
    );
  });
});
