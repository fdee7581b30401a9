// ============================================
// ITINERARY TYPES
// ============================================

import type { Accommodation, Coordinates } from "./places";

export type ActivityType = "SIGHTSEEING" | "DINING" | "EVENT" | "ACCOMMODATION";

export type TransportMode = "WALKING" | "PUBLIC_TRANSPORT" | "TAXI";

/**
 * A single activity in a day. Times are destination wall-clock times
 * stored as UTC instants so that no host timezone leaks in.
 */
export interface ScheduledActivity {
  id: string;
  placeId?: string;
  activityType: ActivityType;
  name: string;
  description: string;
  startTime: Date;
  endTime: Date;
  estimatedCost: number;
  coordinates: Coordinates | null;
  bookingRequired: boolean;
  bookingUrl?: string;
  notes: string[];
}

export interface TravelSegment {
  fromActivityId: string;
  toActivityId: string;
  transportMode: TransportMode;
  durationMinutes: number;
  distanceKm: number;
  cost: number;
  instructions: string;
}

export interface DayItinerary {
  /** YYYY-MM-DD */
  date: string;
  dayNumber: number;
  theme?: string;
  activities: ScheduledActivity[];
  travelSegments: TravelSegment[];
  totalEstimatedCost: number;
  keyHighlights: string[];
  weatherNote?: string;
}

export interface BudgetTracker {
  totalEstimatedCost: number;
  isOverBudget: boolean;
}

export type BudgetCategory =
  | "accommodation"
  | "dining"
  | "attractions"
  | "transportation"
  | "events"
  | "total";

export type BudgetBreakdown = Record<BudgetCategory, number>;

export interface BudgetStatus {
  limit: number;
  attempts: number;
  isOverBudget: boolean;
}

export interface TripItinerary {
  destination: string;
  startDate: string;
  endDate: string;
  totalDays: number;
  days: DayItinerary[];
  accommodation: Accommodation;
  accommodationStays: ScheduledActivity[];
  totalEstimatedCost: number;
  budgetBreakdown: BudgetBreakdown;
  budgetStatus: BudgetStatus;
  warnings: string[];
}
