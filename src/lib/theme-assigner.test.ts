import { describe, it, expect } from "vitest";
import type { Priority } from "@/types/places";
import {
  createMockEstablishment,
  createMockLandmark,
} from "./__tests__/mock-factories";
import { assignPlacesToDay, classifyTheme, matchesTheme } from "./theme-assigner";

describe("classifyTheme", () => {
  it.each([
    ["Historic City Center", "historic"],
    ["Old Town Walk", "historic"],
    ["Museums & Culture", "culture"],
    ["Street Art", "culture"],
    ["Food & Markets", "food"],
    ["Nature & Parks", "nature"],
    ["Local Neighborhoods", "local"],
    ["Hidden Gems", "general"],
    ["Relaxation Day", "general"],
  ])("classifies %s as %s", (theme, bucket) => {
    expect(classifyTheme(theme)).toBe(bucket);
  });
});

describe("matchesTheme", () => {
  it("matches establishments outright for food themes", () => {
    const cafe = createMockEstablishment({ name: "Blue Door", reasonToGo: "Quiet corner" });
    expect(matchesTheme(cafe, "food")).toBe(true);
    expect(matchesTheme(cafe, "historic")).toBe(false);
  });

  it("matches keywords in the name or reason", () => {
    const palace = createMockLandmark({ name: "Royal Palace", reasonToGo: "Gilded rooms" });
    expect(matchesTheme(palace, "historic")).toBe(true);
    expect(matchesTheme(palace, "nature")).toBe(false);
    expect(matchesTheme(palace, "general")).toBe(true);
  });
});

describe("assignPlacesToDay", () => {
  function historicPlaces(priority: Priority, count: number) {
    return Array.from({ length: count }, (_, i) =>
      createMockLandmark({
        id: `${priority.toLowerCase()}-${i}`,
        priority,
        reasonToGo: "Historic streets",
      })
    );
  }

  it("keeps at most 3 essential, 3 high and 2 medium places and no low ones", () => {
    const places = [
      ...historicPlaces("LOW", 2),
      ...historicPlaces("MEDIUM", 5),
      ...historicPlaces("HIGH", 5),
      ...historicPlaces("ESSENTIAL", 5),
    ];

    const result = assignPlacesToDay(places, "Historic City Center", 1);

    expect(result.map((p) => p.id)).toEqual([
      "essential-0",
      "essential-1",
      "essential-2",
      "high-0",
      "high-1",
      "high-2",
      "medium-0",
      "medium-1",
    ]);
  });

  it("filters by the theme's keywords", () => {
    const park = createMockLandmark({ id: "park", name: "City Park", reasonToGo: "Lawns" });
    const museum = createMockLandmark({ id: "museum", name: "Art Museum", reasonToGo: "Paintings" });

    expect(assignPlacesToDay([park, museum], "Nature & Parks", 2).map((p) => p.id)).toEqual(["park"]);
  });

  it("falls back to the first places when nothing matches the theme", () => {
    const places = ["a", "b", "c"].map((id) =>
      createMockLandmark({ id, name: `Spot ${id}`, reasonToGo: "Nice", priority: "HIGH" })
    );

    expect(assignPlacesToDay(places, "Food & Markets", 1).map((p) => p.id)).toEqual(["a", "b", "c"]);
  });

  it("returns the first 8 filtered places when all of them are low priority", () => {
    const places = Array.from({ length: 10 }, (_, i) =>
      createMockLandmark({ id: `low-${i}`, priority: "LOW" })
    );

    const result = assignPlacesToDay(places, "Hidden Gems", 4);

    expect(result.map((p) => p.id)).toEqual(places.slice(0, 8).map((p) => p.id));
  });

  it("returns nothing only for an empty input", () => {
    expect(assignPlacesToDay([], "Hidden Gems", 1)).toEqual([]);
  });
});
