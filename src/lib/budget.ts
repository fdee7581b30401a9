// ============================================
// BUDGET
// ============================================
// Trip cost check for the replan loop and the per-category breakdown.

import type {
  BudgetBreakdown,
  BudgetTracker,
  DayItinerary,
  ScheduledActivity,
  TravelSegment,
} from "@/types/itinerary";
import type { Accommodation } from "@/types/places";
import type { TripRequest } from "@/types/trip";
import { accommodationNightlyPrice } from "./place-utils";

function roundCurrency(amount: number): number {
  return Math.round(amount * 100) / 100;
}

/**
 * Activities plus travel segments for one day
 */
export function calculateDayCost(
  activities: readonly ScheduledActivity[],
  travelSegments: readonly TravelSegment[]
): number {
  const activityCost = activities.reduce((sum, activity) => sum + activity.estimatedCost, 0);
  const travelCost = travelSegments.reduce((sum, segment) => sum + segment.cost, 0);
  return roundCurrency(activityCost + travelCost);
}

/**
 * Sum of the day totals against the trip budget. Always computed from scratch.
 */
export function validateBudget(trip: TripRequest, days: readonly DayItinerary[]): BudgetTracker {
  const totalEstimatedCost = roundCurrency(
    days.reduce((sum, day) => sum + day.totalEstimatedCost, 0)
  );
  return {
    totalEstimatedCost,
    isOverBudget: totalEstimatedCost > trip.budget,
  };
}

/**
 * Per-category costs for the whole group. Lodging is nightly per traveler for
 * every night between the first and last day; dining and event prices are per
 * person; attractions and transport are taken as they are.
 */
export function createBudgetBreakdown(
  accommodation: Accommodation,
  days: readonly DayItinerary[],
  travelers: number
): BudgetBreakdown {
  const nights = Math.max(0, days.length - 1);
  const breakdown: BudgetBreakdown = {
    accommodation: accommodationNightlyPrice(accommodation) * nights * travelers,
    dining: 0,
    attractions: 0,
    transportation: 0,
    events: 0,
    total: 0,
  };

  for (const day of days) {
    for (const activity of day.activities) {
      switch (activity.activityType) {
        case "DINING":
          breakdown.dining += activity.estimatedCost * travelers;
          break;
        case "EVENT":
          breakdown.events += activity.estimatedCost * travelers;
          break;
        case "SIGHTSEEING":
          breakdown.attractions += activity.estimatedCost;
          break;
        case "ACCOMMODATION":
          break;
      }
    }
    for (const segment of day.travelSegments) {
      breakdown.transportation += segment.cost;
    }
  }

  breakdown.accommodation = roundCurrency(breakdown.accommodation);
  breakdown.dining = roundCurrency(breakdown.dining);
  breakdown.attractions = roundCurrency(breakdown.attractions);
  breakdown.transportation = roundCurrency(breakdown.transportation);
  breakdown.events = roundCurrency(breakdown.events);
  breakdown.total = roundCurrency(
    breakdown.accommodation +
      breakdown.dining +
      breakdown.attractions +
      breakdown.transportation +
      breakdown.events
  );

  return breakdown;
}
