// ============================================
// TRAVEL SEGMENTS
// ============================================
// Picks a transport mode, duration and cost for each hop between two
// consecutive activities from the straight-line distance.

import type { ScheduledActivity, TransportMode, TravelSegment } from "@/types/itinerary";
import type { Coordinates } from "@/types/places";
import {
  generateWithRetry,
  travelFaresSchema,
  type ContentGenerationService,
  type TravelFaresResponse,
} from "./content-generation";
import { calculateDistance } from "./geo-distance";
import { buildTravelFaresPrompt } from "./prompts";

// ============================================
// TYPES & RATES
// ============================================

export interface TravelSegmentOptions {
  averagePublicTransportFare: number;
  baseTaxiFare: number;
  currencySymbol: string;
}

export const DEFAULT_TRAVEL_SEGMENT_OPTIONS: TravelSegmentOptions = {
  averagePublicTransportFare: 2.5,
  baseTaxiFare: 1.5,
  currencySymbol: "€",
};

export const WALKING_MAX_KM = 0.5;
export const PUBLIC_TRANSPORT_MAX_KM = 3;

// Minutes per km and floor per mode
const WALKING = { minutesPerKm: 12, minMinutes: 5 };
const PUBLIC_TRANSPORT = { minutesPerKm: 8, minMinutes: 10 };
const TAXI = { minutesPerKm: 5, minMinutes: 15, perKm: 1.2 };

export interface TravelEstimate {
  transportMode: TransportMode;
  durationMinutes: number;
  cost: number;
}

// ============================================
// CLASSIFICATION
// ============================================

export function classifyByDistance(distanceKm: number, options: TravelSegmentOptions): TravelEstimate {
  if (distanceKm <= WALKING_MAX_KM) {
    return {
      transportMode: "WALKING",
      durationMinutes: Math.floor(Math.max(WALKING.minMinutes, distanceKm * WALKING.minutesPerKm)),
      cost: 0,
    };
  }

  if (distanceKm <= PUBLIC_TRANSPORT_MAX_KM) {
    return {
      transportMode: "PUBLIC_TRANSPORT",
      durationMinutes: Math.floor(
        Math.max(PUBLIC_TRANSPORT.minMinutes, distanceKm * PUBLIC_TRANSPORT.minutesPerKm)
      ),
      cost: options.averagePublicTransportFare,
    };
  }

  return {
    transportMode: "TAXI",
    durationMinutes: Math.floor(Math.max(TAXI.minMinutes, distanceKm * TAXI.minutesPerKm)),
    cost: options.baseTaxiFare + distanceKm * TAXI.perKm,
  };
}

export function describeTravel(
  estimate: TravelEstimate,
  distanceKm: number,
  destinationName: string,
  currencySymbol: string
): string {
  const price = `${currencySymbol}${estimate.cost.toFixed(2)}`;
  switch (estimate.transportMode) {
    case "WALKING":
      return `Walk ${Math.floor(distanceKm * 1000)}m to ${destinationName} (${estimate.durationMinutes} mins)`;
    case "PUBLIC_TRANSPORT":
      return `Take public transport to ${destinationName} (${estimate.durationMinutes} mins, ${price})`;
    case "TAXI":
      return `Take taxi to ${destinationName} (${estimate.durationMinutes} mins, ~${price})`;
  }
}

export function classifySegment(
  from: ScheduledActivity & { coordinates: Coordinates },
  to: ScheduledActivity & { coordinates: Coordinates },
  options: TravelSegmentOptions = DEFAULT_TRAVEL_SEGMENT_OPTIONS
): TravelSegment {
  const distanceKm = calculateDistance(from.coordinates, to.coordinates);
  const estimate = classifyByDistance(distanceKm, options);

  return {
    fromActivityId: from.id,
    toActivityId: to.id,
    transportMode: estimate.transportMode,
    durationMinutes: estimate.durationMinutes,
    distanceKm: Math.round(distanceKm * 100) / 100,
    cost: Math.round(estimate.cost * 100) / 100,
    instructions: describeTravel(estimate, distanceKm, to.name, options.currencySymbol),
  };
}

function hasCoordinates(
  activity: ScheduledActivity
): activity is ScheduledActivity & { coordinates: Coordinates } {
  return activity.coordinates !== null;
}

/**
 * Segments between adjacent activities of a start-time ordered day. Pairs
 * missing coordinates or starting at the same instant get none.
 */
export function calculateTravelSegments(
  activities: readonly ScheduledActivity[],
  options: TravelSegmentOptions = DEFAULT_TRAVEL_SEGMENT_OPTIONS
): TravelSegment[] {
  const segments: TravelSegment[] = [];

  for (let i = 0; i < activities.length - 1; i++) {
    const from = activities[i];
    const to = activities[i + 1];
    if (!hasCoordinates(from) || !hasCoordinates(to)) continue;
    if (from.startTime.getTime() === to.startTime.getTime()) continue;
    segments.push(classifySegment(from, to, options));
  }

  return segments;
}

// ============================================
// FARES
// ============================================

/**
 * Local fares from the content-generation service, or the configured
 * defaults when it cannot provide them
 */
export async function fetchFareOptions(
  service: ContentGenerationService,
  destination: string,
  maxAttempts: number,
  defaults: TravelSegmentOptions = DEFAULT_TRAVEL_SEGMENT_OPTIONS
): Promise<TravelSegmentOptions> {
  try {
    const fares: TravelFaresResponse = await generateWithRetry(
      service,
      {
        task: "travelFares",
        prompt: buildTravelFaresPrompt(destination),
        schema: travelFaresSchema,
        logContext: { destination },
      },
      maxAttempts
    );
    console.log(
      `[TravelSegments] Fares for ${destination}: transit ${fares.averagePublicTransportFare}, taxi base ${fares.baseTaxiFare}`
    );
    return { ...defaults, ...fares };
  } catch (error) {
    console.warn(
      `[TravelSegments] Using default fares: ${error instanceof Error ? error.message : String(error)}`
    );
    return defaults;
  }
}
