// ============================================
// PLACE HELPERS
// ============================================
// Variant dispatch over the Place union. Each switch is exhaustive so a new
// place kind fails to compile until it is handled here.

import type { ActivityType } from "@/types/itinerary";
import type { Accommodation, Place, PlaceKind, Priority } from "@/types/places";
import { PRIORITY_ORDER } from "@/types/places";

function assertNever(value: never): never {
  throw new Error(`Unhandled place kind: ${JSON.stringify(value)}`);
}

/**
 * Cheapest listed price, 0 when nothing is listed
 */
export function minPrice(options: readonly number[]): number {
  return options.length > 0 ? Math.min(...options) : 0;
}

/**
 * Estimated per-person cost of visiting a place, assuming the cheapest option
 */
export function estimatePlaceCost(place: Place): number {
  switch (place.kind) {
    case "establishment":
      return place.averagePrice;
    case "event":
      return minPrice(place.priceOptions);
    case "landmark":
    case "accommodation":
      return 0;
    default:
      return assertNever(place);
  }
}

export function activityTypeForPlace(place: Place): ActivityType {
  switch (place.kind) {
    case "establishment":
      return "DINING";
    case "event":
      return "EVENT";
    case "accommodation":
      return "ACCOMMODATION";
    case "landmark":
      return "SIGHTSEEING";
    default:
      return assertNever(place);
  }
}

export function accommodationNightlyPrice(accommodation: Accommodation): number {
  return minPrice(accommodation.priceOptions);
}

/**
 * Lower is more important
 */
export function priorityRank(priority: Priority): number {
  return PRIORITY_ORDER.indexOf(priority);
}

/**
 * Stable sort, ESSENTIAL first
 */
export function sortByPriority<T extends Place>(places: readonly T[]): T[] {
  return [...places].sort((a, b) => priorityRank(a.priority) - priorityRank(b.priority));
}

/**
 * Lower-cased "{name} {reasonToGo}" used for keyword matching
 */
export function placeSearchText(place: Place): string {
  return `${place.name} ${place.reasonToGo}`.toLowerCase();
}

export function ofKind<K extends PlaceKind>(
  places: readonly Place[],
  kind: K
): Extract<Place, { kind: K }>[] {
  return places.filter((place): place is Extract<Place, { kind: K }> => place.kind === kind);
}

export function indexPlaces(places: readonly Place[]): Map<string, Place> {
  return new Map(places.map((place) => [place.id, place]));
}

/**
 * Append items from `source` until `target` holds `count`, skipping ids already present
 */
export function extendUniqueUntil<T extends Place>(
  target: readonly T[],
  source: readonly T[],
  count: number
): T[] {
  const result = [...target];
  const seen = new Set(result.map((place) => place.id));
  for (const place of source) {
    if (result.length >= count) break;
    if (seen.has(place.id)) continue;
    result.push(place);
    seen.add(place.id);
  }
  return result;
}
