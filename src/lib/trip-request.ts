/**
 * Trip Request Utilities
 *
 * Validation and derived values for a traveler's trip request.
 * Only future (or ongoing) trips can be planned.
 */

import type { TripRequest } from "@/types/trip";
import { GROUP_TYPES } from "@/types/trip";
import { daysBetween, parseDateKey, toDateKey } from "./time-utils";

export type TripValidationErrorCode =
  | "INVALID_DATE_FORMAT"
  | "INVALID_START_DATE"
  | "INVALID_END_DATE"
  | "INVALID_BUDGET"
  | "INVALID_TRAVELERS"
  | "INVALID_GROUP_TYPE"
  | "MISSING_INTERESTS"
  | "MISSING_DESTINATION";

export type TripValidationResult =
  | { valid: true }
  | {
      valid: false;
      error: {
        code: TripValidationErrorCode;
        message: string;
      };
    };

function invalid(code: TripValidationErrorCode, message: string): TripValidationResult {
  return { valid: false, error: { code, message } };
}

/**
 * Today's date key (UTC)
 */
export function getToday(): string {
  return toDateKey(new Date());
}

/**
 * Validate a trip request
 *
 * Rules:
 * - Dates are YYYY-MM-DD, start strictly before end
 * - End date is not in the past
 * - Budget and traveler count are positive
 * - At least one non-blank interest
 */
export function validateTripRequest(
  request: TripRequest,
  today: string = getToday()
): TripValidationResult {
  if (!request.destination || request.destination.trim() === "") {
    return invalid("MISSING_DESTINATION", "A destination is required.");
  }

  const start = parseDateKey(request.startDate);
  const end = parseDateKey(request.endDate);

  if (!start) {
    return invalid(
      "INVALID_DATE_FORMAT",
      "Invalid start date format. Please use ISO format (YYYY-MM-DD)."
    );
  }

  if (!end) {
    return invalid(
      "INVALID_DATE_FORMAT",
      "Invalid end date format. Please use ISO format (YYYY-MM-DD)."
    );
  }

  if (start.getTime() >= end.getTime()) {
    return invalid("INVALID_START_DATE", "Start date needs to be before end date.");
  }

  if (request.endDate < today) {
    return invalid("INVALID_END_DATE", "You cannot specify a trip in the past.");
  }

  if (!Number.isFinite(request.budget) || request.budget <= 0) {
    return invalid("INVALID_BUDGET", "Budget must be a positive amount.");
  }

  if (!Number.isInteger(request.travelers) || request.travelers <= 0) {
    return invalid("INVALID_TRAVELERS", "Number of travelers must be a positive whole number.");
  }

  if (!GROUP_TYPES.includes(request.groupType)) {
    return invalid("INVALID_GROUP_TYPE", `Unknown group type: ${String(request.groupType)}.`);
  }

  if (request.interests.filter((interest) => interest.trim() !== "").length === 0) {
    return invalid("MISSING_INTERESTS", "At least one interest is required.");
  }

  return { valid: true };
}

export function getTotalNights(request: TripRequest): number {
  return daysBetween(request.startDate, request.endDate);
}

/**
 * Both start and end dates are inclusive
 */
export function getTotalDays(request: TripRequest): number {
  return getTotalNights(request) + 1;
}

function titleCase(value: string): string {
  return value
    .trim()
    .split(/\s+/)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}

/**
 * Trip summary block embedded in generation prompts
 */
export function formatTripForPrompt(request: TripRequest): string {
  const groupLabel = titleCase(request.groupType);
  return [
    `- Duration: ${getTotalDays(request)} days (${request.startDate} to ${request.endDate})`,
    `- Budget: ${request.budget.toFixed(2)} total`,
    `- Group: ${request.travelers} travelers - '${groupLabel}' trip`,
    `- Interests: ${request.interests.map(titleCase).join(", ")}`,
  ].join("\n");
}
