import { describe, it, expect } from "vitest";
import type { TripRequest } from "@/types/trip";
import { createMockTripRequest } from "./__tests__/mock-factories";
import {
  formatTripForPrompt,
  getTotalDays,
  getTotalNights,
  validateTripRequest,
  type TripValidationErrorCode,
} from "./trip-request";

const TODAY = "2031-01-15";

describe("validateTripRequest", () => {
  it("accepts a well-formed future trip", () => {
    expect(validateTripRequest(createMockTripRequest(), TODAY)).toEqual({ valid: true });
  });

  it("accepts a trip that is already under way", () => {
    const trip = createMockTripRequest({ startDate: "2031-01-10", endDate: "2031-01-15" });
    expect(validateTripRequest(trip, TODAY)).toEqual({ valid: true });
  });

  const cases: { overrides: Partial<TripRequest>; code: TripValidationErrorCode }[] = [
    { overrides: { destination: "  " }, code: "MISSING_DESTINATION" },
    { overrides: { startDate: "2031/05/02" }, code: "INVALID_DATE_FORMAT" },
    { overrides: { endDate: "2031-02-30" }, code: "INVALID_DATE_FORMAT" },
    { overrides: { startDate: "2031-05-04", endDate: "2031-05-04" }, code: "INVALID_START_DATE" },
    { overrides: { startDate: "2031-05-05", endDate: "2031-05-04" }, code: "INVALID_START_DATE" },
    { overrides: { startDate: "2030-12-01", endDate: "2031-01-14" }, code: "INVALID_END_DATE" },
    { overrides: { budget: 0 }, code: "INVALID_BUDGET" },
    { overrides: { budget: Number.NaN }, code: "INVALID_BUDGET" },
    { overrides: { travelers: 0 }, code: "INVALID_TRAVELERS" },
    { overrides: { travelers: 1.5 }, code: "INVALID_TRAVELERS" },
    { overrides: { interests: [] }, code: "MISSING_INTERESTS" },
    { overrides: { interests: ["", " "] }, code: "MISSING_INTERESTS" },
  ];

  it.each(cases)("rejects with $code for $overrides", ({ overrides, code }) => {
    const result = validateTripRequest(createMockTripRequest(overrides), TODAY);
    expect(result).toEqual({ valid: false, error: { code, message: expect.any(String) } });
  });
});

describe("trip length", () => {
  it("counts both the first and last day", () => {
    const trip = createMockTripRequest({ startDate: "2031-05-02", endDate: "2031-05-04" });
    expect(getTotalNights(trip)).toBe(2);
    expect(getTotalDays(trip)).toBe(3);
  });

  it("crosses month boundaries", () => {
    const trip = createMockTripRequest({ startDate: "2031-04-29", endDate: "2031-05-02" });
    expect(getTotalDays(trip)).toBe(4);
  });
});

describe("formatTripForPrompt", () => {
  it("summarizes the request", () => {
    const trip = createMockTripRequest({ interests: ["street food", "HISTORY"] });
    expect(formatTripForPrompt(trip)).toBe(
      [
        "- Duration: 3 days (2031-05-02 to 2031-05-04)",
        "- Budget: 900.00 total",
        "- Group: 2 travelers - 'Couple' trip",
        "- Interests: Street Food, History",
      ].join("\n")
    );
  });
});
