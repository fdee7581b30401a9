// ============================================
// THEME ASSIGNER
// ============================================
// Maps a day's theme label to a bounded subset of the available places.

import type { Place, Priority } from "@/types/places";
import { placeSearchText } from "./place-utils";

export type ThemeBucket = "historic" | "culture" | "food" | "nature" | "local" | "general";

interface BucketDefinition {
  bucket: Exclude<ThemeBucket, "general">;
  /** Substrings of the lower-cased theme that select this bucket */
  triggers: string[];
  /** Substrings of the place text that match this bucket */
  keywords: string[];
  matchesEstablishments?: boolean;
}

// Checked in order; first trigger hit wins
const THEME_BUCKETS: BucketDefinition[] = [
  {
    bucket: "historic",
    triggers: ["histor", "heritage", "old town"],
    keywords: ["historic", "old", "ancient", "cathedral", "palace", "monument"],
  },
  {
    bucket: "culture",
    triggers: ["museum", "culture", "cultural", "art"],
    keywords: ["museum", "gallery", "art", "cultural", "exhibition"],
  },
  {
    bucket: "food",
    triggers: ["food", "market", "culinary", "cuisine", "dining"],
    keywords: ["market", "food", "restaurant"],
    matchesEstablishments: true,
  },
  {
    bucket: "nature",
    triggers: ["nature", "park", "garden", "outdoor"],
    keywords: ["park", "garden", "nature", "outdoor", "beach", "mountain"],
  },
  {
    bucket: "local",
    triggers: ["neighborhood", "neighbourhood", "local"],
    keywords: ["neighborhood", "neighbourhood", "local", "district", "quarter"],
  },
];

export const FALLBACK_PLACE_COUNT = 8;

export const DAILY_PRIORITY_CAPS: Record<Exclude<Priority, "LOW">, number> = {
  ESSENTIAL: 3,
  HIGH: 3,
  MEDIUM: 2,
};

export function classifyTheme(theme: string): ThemeBucket {
  const lower = theme.toLowerCase();
  const match = THEME_BUCKETS.find((definition) =>
    definition.triggers.some((trigger) => lower.includes(trigger))
  );
  return match ? match.bucket : "general";
}

export function matchesTheme(place: Place, bucket: ThemeBucket): boolean {
  if (bucket === "general") return true;

  const definition = THEME_BUCKETS.find((d) => d.bucket === bucket);
  if (!definition) return true;

  if (definition.matchesEstablishments && place.kind === "establishment") {
    return true;
  }

  const text = placeSearchText(place);
  return definition.keywords.some((keyword) => text.includes(keyword));
}

/**
 * Pick the places for one day.
 *
 * Filters by theme (falling back to the first places when nothing matches),
 * then keeps up to 3 essential, 3 high and 2 medium priority places. The
 * result is never empty for a non-empty input.
 */
export function assignPlacesToDay(
  places: readonly Place[],
  theme: string,
  dayNumber: number
): Place[] {
  const bucket = classifyTheme(theme);
  let dayPlaces = places.filter((place) => matchesTheme(place, bucket));

  console.log(
    `[ThemeAssigner] Day ${dayNumber} "${theme}" (${bucket}): ${dayPlaces.length} matching places`
  );

  if (dayPlaces.length === 0) {
    dayPlaces = places.slice(0, FALLBACK_PLACE_COUNT);
  }

  const selected = [
    ...dayPlaces.filter((p) => p.priority === "ESSENTIAL").slice(0, DAILY_PRIORITY_CAPS.ESSENTIAL),
    ...dayPlaces.filter((p) => p.priority === "HIGH").slice(0, DAILY_PRIORITY_CAPS.HIGH),
    ...dayPlaces.filter((p) => p.priority === "MEDIUM").slice(0, DAILY_PRIORITY_CAPS.MEDIUM),
  ];

  if (selected.length === 0) {
    return dayPlaces.slice(0, FALLBACK_PLACE_COUNT);
  }

  return selected;
}
