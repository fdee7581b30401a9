// ============================================
// PLACE SELECTOR
// ============================================
// Scores the discovered place pool against the trip request and keeps a
// working set bounded by trip length and per-person budget.

import type { Place, Priority } from "@/types/places";
import type { GroupType, TripRequest } from "@/types/trip";
import { estimatePlaceCost, placeSearchText } from "./place-utils";
import { getTotalDays } from "./trip-request";

// ============================================
// WEIGHTS
// ============================================

export const PRIORITY_WEIGHTS: Record<Priority, number> = {
  ESSENTIAL: 10,
  HIGH: 7,
  MEDIUM: 4,
  LOW: 1,
};

export const INTEREST_MATCH_POINTS = 2;
export const SOCIAL_VENUE_BONUS = 1;
export const ROMANTIC_BONUS = 1.5;

export const ROMANTIC_KEYWORDS = ["romantic", "sunset", "view", "garden", "park"];

export const MAX_ACTIVITIES_PER_DAY = 6;

/** Share of the per-person budget that activities may consume */
export const ACTIVITY_BUDGET_SHARE = 0.8;

export interface ScoredPlace {
  place: Place;
  score: number;
}

// ============================================
// SCORING
// ============================================

function groupBonus(place: Place, groupType: GroupType): number {
  switch (groupType) {
    case "FRIENDS":
    case "GROUP":
      return place.kind === "establishment" ? SOCIAL_VENUE_BONUS : 0;
    case "COUPLE": {
      const reason = place.reasonToGo.toLowerCase();
      return ROMANTIC_KEYWORDS.some((keyword) => reason.includes(keyword)) ? ROMANTIC_BONUS : 0;
    }
    case "SOLO":
      return 0;
  }
}

/**
 * Relevance of a place for this trip
 */
export function calculatePlaceScore(place: Place, trip: TripRequest): number {
  const text = placeSearchText(place);
  const interestMatches = trip.interests.filter((interest) => {
    const needle = interest.trim().toLowerCase();
    return needle !== "" && text.includes(needle);
  }).length;

  return (
    PRIORITY_WEIGHTS[place.priority] +
    interestMatches * INTEREST_MATCH_POINTS +
    groupBonus(place, trip.groupType)
  );
}

/**
 * Score every place and sort descending; ties keep input order
 */
export function rankPlaces(places: readonly Place[], trip: TripRequest): ScoredPlace[] {
  return places
    .map((place) => ({ place, score: calculatePlaceScore(place, trip) }))
    .sort((a, b) => b.score - a.score);
}

// ============================================
// SELECTION
// ============================================

/**
 * Greedy admission in score order. A place is admitted while there is room and
 * the running activity cost stays within the per-person allowance; essential
 * places are admitted regardless of cost while there is room.
 *
 * An empty result only happens for an empty input and must be treated by the
 * caller as a planning failure.
 */
export function selectPlaces(places: readonly Place[], trip: TripRequest): Place[] {
  const maxPlaces = getTotalDays(trip) * MAX_ACTIVITIES_PER_DAY;
  const allowance = (trip.budget / trip.travelers) * ACTIVITY_BUDGET_SHARE;

  const selected: Place[] = [];
  let runningCost = 0;

  for (const { place } of rankPlaces(places, trip)) {
    if (selected.length >= maxPlaces) break;

    const cost = estimatePlaceCost(place);

    if (runningCost + cost <= allowance) {
      selected.push(place);
      runningCost += cost;
    } else if (place.priority === "ESSENTIAL") {
      selected.push(place);
    }
  }

  console.log(
    `[PlaceSelector] Selected ${selected.length}/${places.length} places (cap ${maxPlaces}, activity cost ${runningCost.toFixed(2)} of ${allowance.toFixed(2)})`
  );

  return selected;
}
