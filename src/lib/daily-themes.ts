// ============================================
// DAILY THEMES
// ============================================
// One theme label per trip day, from the content-generation service with a
// fixed rotation when the service cannot deliver.

import type { Place } from "@/types/places";
import type { TripRequest } from "@/types/trip";
import { dailyThemesSchema, generateWithRetry, type ContentGenerationService } from "./content-generation";
import { buildDailyThemesPrompt } from "./prompts";
import { getTotalDays } from "./trip-request";

export const FALLBACK_THEMES = [
  "Historic City Center",
  "Museums & Culture",
  "Local Neighborhoods",
  "Nature & Parks",
  "Food & Markets",
  "Hidden Gems",
  "Relaxation Day",
] as const;

export function fallbackThemes(totalDays: number): string[] {
  return Array.from({ length: totalDays }, (_, i) => FALLBACK_THEMES[i % FALLBACK_THEMES.length]);
}

/**
 * Exactly `totalDays` non-blank labels: extras are dropped and missing days
 * become "Exploration Day N"
 */
export function normalizeThemes(themes: readonly string[], totalDays: number): string[] {
  const cleaned = themes.map((theme) => theme.trim()).filter((theme) => theme !== "");
  const result = cleaned.slice(0, totalDays);
  for (let day = result.length + 1; day <= totalDays; day++) {
    result.push(`Exploration Day ${day}`);
  }
  return result;
}

export async function generateDailyThemes(
  service: ContentGenerationService,
  trip: TripRequest,
  places: readonly Place[],
  maxAttempts: number
): Promise<string[]> {
  const totalDays = getTotalDays(trip);

  try {
    const response = await generateWithRetry(
      service,
      {
        task: "dailyThemes",
        prompt: buildDailyThemesPrompt(trip, places),
        schema: dailyThemesSchema,
        logContext: { destination: trip.destination, totalDays },
      },
      maxAttempts
    );

    if (response.themes.length !== totalDays) {
      console.log(
        `[DailyThemes] Got ${response.themes.length} themes for ${totalDays} days, adjusting`
      );
    }
    return normalizeThemes(response.themes, totalDays);
  } catch (error) {
    console.warn(
      `[DailyThemes] Using fallback themes: ${error instanceof Error ? error.message : String(error)}`
    );
    return fallbackThemes(totalDays);
  }
}
