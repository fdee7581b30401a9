import { describe, it, expect, beforeEach } from "vitest";
import type { ScheduledActivity } from "@/types/itinerary";
import type { Coordinates } from "@/types/places";
import {
  createMockActivity,
  createMockEstablishment,
  createMockLandmark,
  MOCK_DESTINATIONS,
  northOf,
  resetIdCounter,
} from "./__tests__/mock-factories";
import { pathLength } from "./geo-distance";
import { indexPlaces } from "./place-utils";
import { optimizeRoute, orderByNearestNeighbor } from "./route-optimizer";

const base = MOCK_DESTINATIONS.lisbon;

function at(hhmm: string): Date {
  return new Date(`2031-05-02T${hhmm}:00.000Z`);
}

function visit(id: string, coordinates: Coordinates | null, start: string, end: string): ScheduledActivity {
  return createMockActivity({ id, placeId: id, coordinates, startTime: at(start), endTime: at(end) });
}

function coordinatesOf(activities: ScheduledActivity[]): Coordinates[] {
  return activities.flatMap((activity) => (activity.coordinates ? [activity.coordinates] : []));
}

beforeEach(() => {
  resetIdCounter();
});

describe("orderByNearestNeighbor", () => {
  it("always goes to the closest remaining point", () => {
    const points = [
      { id: "start", coordinates: base },
      { id: "far", coordinates: northOf(base, 5) },
      { id: "near", coordinates: northOf(base, 1) },
      { id: "middle", coordinates: northOf(base, 3) },
    ];
    expect(orderByNearestNeighbor(points).map((p) => p.id)).toEqual(["start", "near", "middle", "far"]);
  });

  it("keeps the earliest point on ties", () => {
    const points = [
      { id: "start", coordinates: base },
      { id: "first", coordinates: northOf(base, 1) },
      { id: "second", coordinates: northOf(base, 1) },
    ];
    expect(orderByNearestNeighbor(points).map((p) => p.id)).toEqual(["start", "first", "second"]);
  });
});

describe("optimizeRoute", () => {
  const a = visit("a", base, "09:00", "10:00");
  const b = visit("b", northOf(base, 3), "10:30", "11:30");
  const c = visit("c", northOf(base, 1), "12:00", "13:00");
  const concert = createMockActivity({
    id: "concert",
    activityType: "EVENT",
    coordinates: northOf(base, 5),
    startTime: at("20:00"),
    endTime: at("22:00"),
  });

  it("visits the closest place next and re-times the day with a 30 minute buffer", () => {
    const result = optimizeRoute([a, b, c, concert]);

    expect(result.map((activity) => activity.id)).toEqual(["a", "c", "b", "concert"]);
    expect(result.map((activity) => activity.startTime.toISOString())).toEqual([
      "2031-05-02T09:00:00.000Z",
      "2031-05-02T10:30:00.000Z",
      "2031-05-02T12:00:00.000Z",
      "2031-05-02T20:00:00.000Z",
    ]);
    expect(result[1].endTime.toISOString()).toBe("2031-05-02T11:30:00.000Z");
  });

  it("shortens the path", () => {
    const before = [a, b, c];
    const after = optimizeRoute(before);
    expect(pathLength(coordinatesOf(after))).toBeLessThan(pathLength(coordinatesOf(before)));
  });

  it("uses the place's typical stay when it is known", () => {
    const places = indexPlaces([createMockLandmark({ id: "c", typicalHoursOfStay: 2 })]);
    const result = optimizeRoute([a, b, c], places);

    expect(result[1].id).toBe("c");
    expect(result[1].endTime.toISOString()).toBe("2031-05-02T12:30:00.000Z");
    expect(result[2].startTime.toISOString()).toBe("2031-05-02T13:00:00.000Z");
  });

  it("does not mutate its input", () => {
    optimizeRoute([a, b, c]);
    expect(b.startTime.toISOString()).toBe("2031-05-02T10:30:00.000Z");
    expect(c.startTime.toISOString()).toBe("2031-05-02T12:00:00.000Z");
  });

  it("is stable when run again on its own output", () => {
    const once = optimizeRoute([a, b, c, concert]);
    expect(optimizeRoute(once)).toEqual(once);
  });

  it("only sorts when there are two or fewer places to route", () => {
    const result = optimizeRoute([c, a]);
    expect(result).toEqual([a, c]);
  });

  it("leaves activities without coordinates in their slot", () => {
    const unknown = visit("unknown", null, "14:00", "15:00");
    const result = optimizeRoute([a, b, c, unknown]);

    expect(result.map((activity) => activity.id)).toEqual(["a", "c", "b", "unknown"]);
    expect(result[3]).toBe(unknown);
  });

  describe("around pinned activities", () => {
    const start = visit("a", base, "09:00", "11:00");
    const far = visit("far", northOf(base, 8), "11:30", "13:30");
    const near = visit("near", northOf(base, 1), "14:00", "16:00");
    const show = createMockActivity({
      id: "show",
      activityType: "EVENT",
      coordinates: northOf(base, 2),
      startTime: at("12:00"),
      endTime: at("13:00"),
    });

    it("moves a visit that would run into an event to after it", () => {
      const result = optimizeRoute([start, far, near, show]);

      expect(result.map((activity) => activity.id)).toEqual(["a", "show", "near", "far"]);
      expect(result.map((activity) => activity.startTime.toISOString())).toEqual([
        "2031-05-02T09:00:00.000Z",
        "2031-05-02T12:00:00.000Z",
        "2031-05-02T13:30:00.000Z",
        "2031-05-02T16:00:00.000Z",
      ]);
      for (let i = 1; i < result.length; i++) {
        expect(result[i].startTime.getTime()).toBeGreaterThanOrEqual(result[i - 1].endTime.getTime());
      }
    });

    it("is stable when run again on its own output", () => {
      const once = optimizeRoute([start, far, near, show]);
      expect(optimizeRoute(once)).toEqual(once);
    });
  });

  it("renames moved meals and re-checks opening hours at the new time", () => {
    const places = indexPlaces([
      createMockLandmark({ id: "a", coordinates: base }),
      createMockLandmark({ id: "near", coordinates: northOf(base, 1) }),
      createMockLandmark({ id: "far", coordinates: northOf(base, 8) }),
      createMockEstablishment({
        id: "tasca",
        name: "Tasca",
        coordinates: northOf(base, 8.5),
        openingSchedule: { Daily: "12:00-15:00" },
      }),
    ]);
    const lunch = createMockActivity({
      id: "tasca",
      placeId: "tasca",
      activityType: "DINING",
      name: "Lunch at Tasca",
      coordinates: northOf(base, 8.5),
      startTime: at("12:00"),
      endTime: at("13:30"),
      notes: ["Book ahead"],
    });

    const result = optimizeRoute(
      [
        visit("a", base, "09:00", "11:00"),
        visit("far", northOf(base, 8), "14:00", "16:00"),
        lunch,
        visit("near", northOf(base, 1), "16:30", "18:30"),
      ],
      places
    );

    expect(result.map((activity) => activity.id)).toEqual(["a", "near", "far", "tasca"]);
    const moved = result[3];
    expect(moved.startTime.toISOString()).toBe("2031-05-02T16:30:00.000Z");
    expect(moved.name).toBe("Tasca");
    expect(moved.notes).toEqual([
      "Book ahead",
      "May be closed at this time (opening hours on Friday: 12:00-15:00)",
    ]);
  });
});
