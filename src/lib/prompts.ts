/**
 * Centralized AI Prompts
 *
 * System prompts for every content-generation task, plus builders for the
 * task-specific user prompts.
 *
 * Usage:
 *   import { getSystemPrompt, buildDailyThemesPrompt } from "./prompts";
 *   const system = getSystemPrompt("dailyThemes");
 */

import type { Place } from "@/types/places";
import type { TripRequest } from "@/types/trip";
import type { DayScheduleContext } from "./schedule-builder";
import { formatTripForPrompt, getTotalDays } from "./trip-request";

// ============================================
// TYPES
// ============================================

export type PromptName = "dailyThemes" | "dayActivities" | "travelFares";

// ============================================
// PROMPT DEFINITIONS
// ============================================

export const PROMPTS: Record<PromptName, string> = {
  // ------------------------------------------
  // 1. DAILY THEMES
  // ------------------------------------------
  dailyThemes: `You are an experienced travel planner who gives each day of a trip a clear focus.

Given a trip summary and the places available, propose one short theme per day.

RULES:
- Exactly one theme per day, in day order
- 2 to 5 words per theme (e.g. "Historic City Center", "Food & Markets", "Nature & Parks")
- Spread the traveler's interests across the trip
- Do not repeat a theme

Respond with JSON only:
{"themes": ["Theme for day 1", "Theme for day 2"]}`,

  // ------------------------------------------
  // 2. DAY ACTIVITIES
  // ------------------------------------------
  dayActivities: `You are an experienced travel planner building a single day of an itinerary.

You receive the day's context and three candidate lists (landmarks, establishments, events).
Choose a realistic, enjoyable sequence of visits for that day.

RULES:
- Only use placeId values from the candidate lists, exactly as given
- Stay inside the day window; leave about 30 minutes between visits for travel
- Respect opening hours; never schedule a place on a day it is closed
- Events have a fixed start time; schedule them at that time
- Include lunch (11:00-14:59) and dinner (after 18:00) at establishments when available
- Between 3 and 6 activities
- When a dailyBudgetCap is given, keep the summed cost of the chosen places under it
- startTime is 24h "HH:MM"; durationHours is a positive number

Respond with JSON only:
{"activities": [{"placeId": "...", "startTime": "09:30", "durationHours": 2}]}`,

  // ------------------------------------------
  // 3. TRAVEL FARES
  // ------------------------------------------
  travelFares: `You are a local transport expert.

For the given destination, estimate:
- averagePublicTransportFare: the price of a single public transport ticket
- baseTaxiFare: the taxi flag-fall (starting price before distance is charged)

Use the local currency as a plain number without symbols.

Respond with JSON only:
{"averagePublicTransportFare": 2.5, "baseTaxiFare": 1.5}`,
};

/**
 * Get the system prompt for a task
 */
export function getSystemPrompt(name: PromptName): string {
  return PROMPTS[name];
}

// ============================================
// DYNAMIC PROMPT BUILDERS
// ============================================

function describePlaceForThemes(place: Place): string {
  return `- ${place.name} (${place.kind}, ${place.priority}): ${place.reasonToGo}`;
}

export function buildDailyThemesPrompt(trip: TripRequest, places: readonly Place[]): string {
  const totalDays = getTotalDays(trip);
  return `Plan daily themes for a trip to ${trip.destination}.

TRIP:
${formatTripForPrompt(trip)}

AVAILABLE PLACES:
${places.map(describePlaceForThemes).join("\n")}

Return exactly ${totalDays} themes.`;
}

export function buildDayActivitiesPrompt(context: DayScheduleContext): string {
  return `Build day ${context.dayNumber} (${context.weekday} ${context.date}) of a trip to ${context.destination}.

DAY CONTEXT:
${JSON.stringify(context, null, 2)}`;
}

export function buildTravelFaresPrompt(destination: string): string {
  return `Destination: ${destination}

Estimate the average public transport fare and the base taxi fare.`;
}
