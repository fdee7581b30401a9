/**
 * Accommodation Choice
 *
 * Picks where the group sleeps and lays out one overnight stay per night.
 */

import type { ScheduledActivity } from "@/types/itinerary";
import type { Accommodation, Priority } from "@/types/places";
import type { TripRequest } from "@/types/trip";
import { accommodationNightlyPrice } from "./place-utils";
import { addDays, combineDateAndTime } from "./time-utils";
import { getTotalNights } from "./trip-request";

/** Nightly price may exceed the per-night, per-person budget by this factor */
export const AFFORDABILITY_MARGIN = 1.2;

export const ACCOMMODATION_PRIORITY_POINTS: Record<Priority, number> = {
  ESSENTIAL: 3,
  HIGH: 2,
  MEDIUM: 1,
  LOW: 0,
};

export const CHECK_IN_TIME = "22:00";
export const CHECK_OUT_TIME = "09:00";

function cheapest(accommodations: readonly Accommodation[]): Accommodation {
  return accommodations.reduce((best, option) =>
    accommodationNightlyPrice(option) < accommodationNightlyPrice(best) ? option : best
  );
}

/**
 * Best affordable option by priority plus relative cheapness; the cheapest
 * option when none is affordable; null for an empty list.
 */
export function selectBestAccommodation(
  accommodations: readonly Accommodation[],
  trip: TripRequest
): Accommodation | null {
  if (accommodations.length === 0) return null;

  const nights = Math.max(1, getTotalNights(trip));
  const threshold = trip.budget / trip.travelers / nights;

  const affordable = accommodations.filter(
    (option) => accommodationNightlyPrice(option) <= threshold * AFFORDABILITY_MARGIN
  );

  if (affordable.length === 0) {
    const fallback = cheapest(accommodations);
    console.log(
      `[Accommodation] Nothing within ${(threshold * AFFORDABILITY_MARGIN).toFixed(2)}/night, taking cheapest: ${fallback.name}`
    );
    return fallback;
  }

  const prices = affordable.map(accommodationNightlyPrice);
  const minPrice = Math.min(...prices);
  const maxPrice = Math.max(...prices);

  let best = affordable[0];
  let bestScore = -Infinity;
  for (const option of affordable) {
    let score = ACCOMMODATION_PRIORITY_POINTS[option.priority];
    if (maxPrice > minPrice) {
      score += 2 * (1 - (accommodationNightlyPrice(option) - minPrice) / (maxPrice - minPrice));
    }
    if (score > bestScore) {
      best = option;
      bestScore = score;
    }
  }

  console.log(`[Accommodation] Selected ${best.name} (score ${bestScore.toFixed(2)})`);
  return best;
}

/**
 * One overnight stay per night of the trip, 22:00 to 09:00 the next morning
 */
export function buildAccommodationStays(
  accommodation: Accommodation,
  trip: TripRequest
): ScheduledActivity[] {
  const nights = getTotalNights(trip);
  const costPerPerson = accommodationNightlyPrice(accommodation) / trip.travelers;

  return Array.from({ length: nights }, (_, night): ScheduledActivity => {
    const date = addDays(trip.startDate, night);
    return {
      id: `stay-${night + 1}`,
      placeId: accommodation.id,
      activityType: "ACCOMMODATION",
      name: `Overnight at ${accommodation.name}`,
      description: accommodation.reasonToGo,
      startTime: combineDateAndTime(date, CHECK_IN_TIME),
      endTime: combineDateAndTime(addDays(date, 1), CHECK_OUT_TIME),
      estimatedCost: Math.round(costPerPerson * 100) / 100,
      coordinates: accommodation.coordinates ?? null,
      bookingRequired: accommodation.bookingRequired ?? false,
      ...(accommodation.website ? { bookingUrl: accommodation.website } : {}),
      notes: [],
    };
  });
}
