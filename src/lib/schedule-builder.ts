// ============================================
// DAY SCHEDULE BUILDER
// ============================================
// Turns one day's themed places into scheduled activities. The content
// generation service picks the places and times; this module prepares the
// candidates it chooses from and checks what comes back.

import type { DayItinerary, ScheduledActivity } from "@/types/itinerary";
import type {
  Establishment,
  Event,
  Landmark,
  OpeningSchedule,
  Place,
  PlaceKind,
  Priority,
} from "@/types/places";
import type { GroupType, TripRequest } from "@/types/trip";
import {
  dayActivitiesSchema,
  generateWithRetry,
  type ContentGenerationService,
  type DayActivityEntry,
} from "./content-generation";
import { getPlannerConfig } from "./config";
import { checkOpeningHours } from "./opening-hours";
import {
  activityTypeForPlace,
  estimatePlaceCost,
  extendUniqueUntil,
  indexPlaces,
  ofKind,
  sortByPriority,
} from "./place-utils";
import { buildDayActivitiesPrompt } from "./prompts";
import { assignPlacesToDay } from "./theme-assigner";
import {
  addHours,
  combineDateAndTime,
  getWeekday,
  minutesOfDay,
  parseLocalDateTime,
  toDateKey,
  toTimeOfDay,
  type Weekday,
} from "./time-utils";

// ============================================
// CONSTANTS
// ============================================

export const DAY_WINDOW = { start: "09:00", end: "22:00" } as const;

export const MIN_LANDMARK_CANDIDATES = 5;
export const MIN_ESTABLISHMENT_CANDIDATES = 4;

/** Below this many unused places the pool starts over from the working set */
export const POOL_RESET_THRESHOLD = 6;

export const DEFAULT_STAY_HOURS = 2;

export const WEATHER_SUFFIX = " (Weather dependent - check forecast!)";

const LUNCH_START_MINUTES = 11 * 60;
const LUNCH_END_MINUTES = 15 * 60;
const DINNER_START_MINUTES = 18 * 60;

// ============================================
// TYPES
// ============================================

/**
 * Places not yet used by earlier days. Passed by value; each build returns the next one.
 */
export interface DayPlanningPool {
  readonly remaining: readonly Place[];
}

/**
 * A candidate as presented to the content-generation service
 */
export interface CandidatePlace {
  placeId: string;
  name: string;
  kind: PlaceKind;
  priority: Priority;
  typicalHoursOfStay: number;
  openingSchedule: OpeningSchedule;
  cost: number;
  fixedDateTime?: string;
}

export interface DayScheduleContext {
  date: string;
  weekday: Weekday;
  dayNumber: number;
  theme: string;
  destination: string;
  groupType: GroupType;
  travelers: number;
  dayWindow: { start: string; end: string };
  landmarks: CandidatePlace[];
  establishments: CandidatePlace[];
  events: CandidatePlace[];
  dailyBudgetCap?: number;
}

export interface DayCandidates {
  landmarks: Landmark[];
  establishments: Establishment[];
  events: Event[];
}

export interface BuildDayRequest {
  trip: TripRequest;
  /** YYYY-MM-DD */
  date: string;
  dayNumber: number;
  theme: string;
  workingSet: readonly Place[];
  pool: DayPlanningPool;
  dailyBudgetCap?: number;
}

export interface BuildDayResult {
  day: DayItinerary;
  nextPool: DayPlanningPool;
  warnings: string[];
}

export interface PlacedActivity {
  activity: ScheduledActivity;
  place: Place;
}

// ============================================
// HELPERS
// ============================================

/**
 * Stay length in hours. The place's typical stay wins; the requested duration
 * only fills in when the place has none.
 */
export function resolveStayHours(typicalHoursOfStay: number, requestedHours?: number): number {
  if (typicalHoursOfStay > 0) return typicalHoursOfStay;
  if (requestedHours !== undefined && requestedHours > 0) return requestedHours;
  return DEFAULT_STAY_HOURS;
}

export function eventDateKey(event: Event): string | null {
  const fixed = parseLocalDateTime(event.dateTime);
  return fixed ? toDateKey(fixed) : null;
}

export function sumActivityCost(activities: readonly ScheduledActivity[]): number {
  return activities.reduce((sum, activity) => sum + activity.estimatedCost, 0);
}

/**
 * Names of the first three sightseeing activities
 */
export function pickKeyHighlights(activities: readonly ScheduledActivity[]): string[] {
  return activities
    .filter((activity) => activity.activityType === "SIGHTSEEING")
    .slice(0, 3)
    .map((activity) => activity.name);
}

export function buildWeatherNote(places: readonly Place[]): string | undefined {
  const names = places.filter((place) => place.weatherDependent).map((place) => place.name);
  if (names.length === 0) return undefined;
  return `Weather-dependent plans: ${names.join(", ")}. Check the forecast before heading out.`;
}

function isRestaurant(place: Place): boolean {
  return place.kind === "establishment" && place.establishmentType.toLowerCase().includes("restaurant");
}

export function describeActivityName(place: Place, startTime: Date): string {
  if (!isRestaurant(place)) return place.name;

  const minutes = minutesOfDay(startTime);
  if (minutes >= LUNCH_START_MINUTES && minutes < LUNCH_END_MINUTES) {
    return `Lunch at ${place.name}`;
  }
  if (minutes >= DINNER_START_MINUTES) {
    return `Dinner at ${place.name}`;
  }
  return place.name;
}

// ============================================
// POOL & CANDIDATES
// ============================================

export function preparePool(
  pool: DayPlanningPool,
  workingSet: readonly Place[],
  dayNumber: number
): DayPlanningPool {
  if (pool.remaining.length >= POOL_RESET_THRESHOLD) {
    return pool;
  }
  console.log(
    `[ScheduleBuilder] Day ${dayNumber}: only ${pool.remaining.length} unused places left, reusing the working set`
  );
  return { remaining: [...workingSet] };
}

export function buildDayCandidates(
  themed: readonly Place[],
  pool: DayPlanningPool,
  workingSet: readonly Place[],
  date: string
): DayCandidates {
  const landmarks = extendUniqueUntil(
    extendUniqueUntil(
      sortByPriority(ofKind(themed, "landmark")),
      ofKind(pool.remaining, "landmark"),
      MIN_LANDMARK_CANDIDATES
    ),
    ofKind(workingSet, "landmark"),
    MIN_LANDMARK_CANDIDATES
  );

  const establishments = extendUniqueUntil(
    extendUniqueUntil(
      sortByPriority(ofKind(themed, "establishment")),
      ofKind(pool.remaining, "establishment"),
      MIN_ESTABLISHMENT_CANDIDATES
    ),
    ofKind(workingSet, "establishment"),
    MIN_ESTABLISHMENT_CANDIDATES
  );

  const events = ofKind(workingSet, "event").filter((event) => eventDateKey(event) === date);

  return { landmarks, establishments, events };
}

function toCandidate(place: Place): CandidatePlace {
  return {
    placeId: place.id,
    name: place.name,
    kind: place.kind,
    priority: place.priority,
    typicalHoursOfStay: place.typicalHoursOfStay,
    openingSchedule: place.openingSchedule,
    cost: estimatePlaceCost(place),
    ...(place.kind === "event" ? { fixedDateTime: place.dateTime } : {}),
  };
}

export function buildDayContext(request: BuildDayRequest, candidates: DayCandidates): DayScheduleContext {
  return {
    date: request.date,
    weekday: getWeekday(request.date),
    dayNumber: request.dayNumber,
    theme: request.theme,
    destination: request.trip.destination,
    groupType: request.trip.groupType,
    travelers: request.trip.travelers,
    dayWindow: { start: DAY_WINDOW.start, end: DAY_WINDOW.end },
    landmarks: candidates.landmarks.map(toCandidate),
    establishments: candidates.establishments.map(toCandidate),
    events: candidates.events.map(toCandidate),
    ...(request.dailyBudgetCap !== undefined
      ? { dailyBudgetCap: Math.round(request.dailyBudgetCap * 100) / 100 }
      : {}),
  };
}

// ============================================
// RESPONSE CONVERSION
// ============================================

type StartResolution =
  | { ok: true; startTime: Date; note?: string }
  | { ok: false; reason: string };

function resolveStartTime(place: Place, entry: DayActivityEntry, date: string): StartResolution {
  if (place.kind !== "event") {
    return { ok: true, startTime: combineDateAndTime(date, entry.startTime) };
  }

  // Events always start at their fixed time
  const fixed = parseLocalDateTime(place.dateTime);
  if (!fixed || toDateKey(fixed) !== date) {
    return { ok: false, reason: `event "${place.name}" does not take place on ${date}` };
  }

  const requested = combineDateAndTime(date, entry.startTime);
  if (requested.getTime() !== fixed.getTime()) {
    return {
      ok: true,
      startTime: fixed,
      note: `Starts at its fixed time ${toTimeOfDay(fixed)} (requested ${toTimeOfDay(requested)})`,
    };
  }
  return { ok: true, startTime: fixed };
}

function toScheduledActivity(
  place: Place,
  entry: DayActivityEntry,
  startTime: Date,
  id: string,
  date: string,
  extraNotes: string[]
): ScheduledActivity {
  const notes = [...extraNotes];
  if (place.kind !== "event") {
    const openingNote = checkOpeningHours(place.openingSchedule, date, minutesOfDay(startTime));
    if (openingNote) notes.push(openingNote);
  }

  return {
    id,
    placeId: place.id,
    activityType: activityTypeForPlace(place),
    name: describeActivityName(place, startTime),
    description: place.weatherDependent ? place.reasonToGo + WEATHER_SUFFIX : place.reasonToGo,
    startTime,
    endTime: addHours(startTime, resolveStayHours(place.typicalHoursOfStay, entry.durationHours)),
    estimatedCost: estimatePlaceCost(place),
    coordinates: place.coordinates ?? null,
    bookingRequired: place.bookingRequired ?? false,
    ...(place.website ? { bookingUrl: place.website } : {}),
    notes,
  };
}

/**
 * Resolve each response entry against the place index. Entries with an
 * unknown, repeated or off-date place are dropped and reported. Response
 * order is kept.
 */
export function convertEntries(
  entries: readonly DayActivityEntry[],
  placesById: ReadonlyMap<string, Place>,
  date: string,
  dayNumber: number
): { placed: PlacedActivity[]; warnings: string[] } {
  const placed: PlacedActivity[] = [];
  const warnings: string[] = [];
  const seen = new Set<string>();

  const drop = (reason: string) => {
    const warning = `Day ${dayNumber}: dropped ${reason}`;
    console.log(`[ScheduleBuilder] ${warning}`);
    warnings.push(warning);
  };

  for (const entry of entries) {
    const place = placesById.get(entry.placeId);
    if (!place) {
      drop(`unknown place "${entry.placeId}"`);
      continue;
    }
    if (seen.has(place.id)) {
      drop(`repeated place "${place.name}"`);
      continue;
    }

    const start = resolveStartTime(place, entry, date);
    if (!start.ok) {
      drop(start.reason);
      continue;
    }

    seen.add(place.id);
    const id = `day${dayNumber}-activity-${placed.length + 1}`;
    const notes = start.note ? [start.note] : [];
    placed.push({
      activity: toScheduledActivity(place, entry, start.startTime, id, date, notes),
      place,
    });
  }

  return { placed, warnings };
}

// ============================================
// DAILY SPENDING CAP
// ============================================

/**
 * Drop the most expensive non-essential activity (latest on ties) until the
 * day's activity cost fits under the cap or nothing more can go.
 */
export function applyDailyCap(
  placed: readonly PlacedActivity[],
  cap: number,
  dayNumber: number
): { kept: PlacedActivity[]; warnings: string[] } {
  const kept = [...placed];
  const warnings: string[] = [];

  while (sumActivityCost(kept.map((p) => p.activity)) > cap) {
    let removeIndex = -1;
    for (let i = 0; i < kept.length; i++) {
      const { activity, place } = kept[i];
      if (place.priority === "ESSENTIAL" || activity.estimatedCost <= 0) continue;
      if (removeIndex < 0 || activity.estimatedCost >= kept[removeIndex].activity.estimatedCost) {
        removeIndex = i;
      }
    }
    if (removeIndex < 0) break;

    const [removed] = kept.splice(removeIndex, 1);
    const warning = `Day ${dayNumber}: removed "${removed.activity.name}" to stay within the daily cap of ${cap.toFixed(2)}`;
    console.log(`[ScheduleBuilder] ${warning}`);
    warnings.push(warning);
  }

  return { kept, warnings };
}

// ============================================
// BUILDER
// ============================================

export class DayScheduleBuilder {
  constructor(
    private readonly service: ContentGenerationService,
    private readonly maxAttempts: number = getPlannerConfig().collaboratorMaxAttempts
  ) {}

  /**
   * Build one day. Throws when the content-generation service fails on every attempt.
   */
  async buildDay(request: BuildDayRequest): Promise<BuildDayResult> {
    const { date, dayNumber, theme, workingSet } = request;

    const pool = preparePool(request.pool, workingSet, dayNumber);
    const themed = assignPlacesToDay(pool.remaining, theme, dayNumber);
    const candidates = buildDayCandidates(themed, pool, workingSet, date);
    const context = buildDayContext(request, candidates);

    const response = await generateWithRetry(
      this.service,
      {
        task: "dayActivities",
        prompt: buildDayActivitiesPrompt(context),
        schema: dayActivitiesSchema,
        logContext: { dayNumber, date, theme },
      },
      this.maxAttempts
    );

    const converted = convertEntries(response.activities, indexPlaces(workingSet), date, dayNumber);
    const capped =
      request.dailyBudgetCap !== undefined
        ? applyDailyCap(converted.placed, request.dailyBudgetCap, dayNumber)
        : { kept: converted.placed, warnings: [] };

    const activities = capped.kept.map((p) => p.activity);
    const consumed = new Set([...themed.map((p) => p.id), ...capped.kept.map((p) => p.place.id)]);
    const nextPool: DayPlanningPool = {
      remaining: pool.remaining.filter((place) => !consumed.has(place.id)),
    };

    const warnings = [...converted.warnings, ...capped.warnings];
    if (activities.length === 0) {
      warnings.push(`Day ${dayNumber}: no activities could be scheduled`);
    }

    const weatherNote = buildWeatherNote(capped.kept.map((p) => p.place));
    const day: DayItinerary = {
      date,
      dayNumber,
      theme,
      activities,
      travelSegments: [],
      totalEstimatedCost: sumActivityCost(activities),
      keyHighlights: pickKeyHighlights(activities),
      ...(weatherNote ? { weatherNote } : {}),
    };

    console.log(
      `[ScheduleBuilder] Day ${dayNumber} (${date}) "${theme}": ${activities.length} activities, ${nextPool.remaining.length} places left in pool`
    );

    return { day, nextPool, warnings };
  }
}

export function createDayScheduleBuilder(
  service: ContentGenerationService,
  maxAttempts?: number
): DayScheduleBuilder {
  return new DayScheduleBuilder(service, maxAttempts);
}
