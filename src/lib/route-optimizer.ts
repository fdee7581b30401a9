// ============================================
// ROUTE OPTIMIZER
// ============================================
// Reorders a day's geo-located activities with a nearest-neighbor tour to cut
// backtracking, then lays their times out again back to back around the
// activities that keep their slot.

import type { ScheduledActivity } from "@/types/itinerary";
import type { Coordinates, Place } from "@/types/places";
import { calculateDistance } from "./geo-distance";
import { checkOpeningHours, isOpeningHoursNote } from "./opening-hours";
import { describeActivityName, resolveStayHours } from "./schedule-builder";
import { addHours, addMinutes, minutesOfDay, toDateKey } from "./time-utils";

export const TRAVEL_BUFFER_MINUTES = 30;

type RoutableActivity = ScheduledActivity & { coordinates: Coordinates };

/**
 * Fixed-time events, overnight stays and activities without coordinates keep their slot
 */
function isRoutable(activity: ScheduledActivity): activity is RoutableActivity {
  return (
    activity.coordinates !== null &&
    activity.activityType !== "EVENT" &&
    activity.activityType !== "ACCOMMODATION"
  );
}

function byStartTime(a: ScheduledActivity, b: ScheduledActivity): number {
  return a.startTime.getTime() - b.startTime.getTime();
}

/**
 * Nearest-neighbor tour from the first activity. Ties go to the earliest remaining.
 */
export function orderByNearestNeighbor<T extends { coordinates: Coordinates }>(items: readonly T[]): T[] {
  if (items.length <= 2) return [...items];

  const remaining = items.slice(1);
  const ordered: T[] = [items[0]];

  while (remaining.length > 0) {
    const last = ordered[ordered.length - 1];
    let bestIndex = 0;
    let bestDistance = Infinity;

    for (let i = 0; i < remaining.length; i++) {
      const distance = calculateDistance(last.coordinates, remaining[i].coordinates);
      if (distance < bestDistance) {
        bestDistance = distance;
        bestIndex = i;
      }
    }

    ordered.push(remaining[bestIndex]);
    remaining.splice(bestIndex, 1);
  }

  return ordered;
}

function stayHoursFor(activity: ScheduledActivity, place: Place | undefined): number {
  const currentHours = (activity.endTime.getTime() - activity.startTime.getTime()) / (60 * 60 * 1000);
  return resolveStayHours(place?.typicalHoursOfStay ?? 0, currentHours);
}

interface TimeSlot {
  startTime: Date;
  endTime: Date;
}

/**
 * First slot of `hours` at or after `earliest` that keeps a travel buffer on
 * both sides of every pinned activity
 */
function findFreeSlot(earliest: Date, hours: number, pinned: readonly TimeSlot[]): TimeSlot {
  let startTime = earliest;
  let endTime = addHours(startTime, hours);

  const clashes = (slot: TimeSlot) =>
    startTime.getTime() < addMinutes(slot.endTime, TRAVEL_BUFFER_MINUTES).getTime() &&
    addMinutes(endTime, TRAVEL_BUFFER_MINUTES).getTime() > slot.startTime.getTime();

  let clash = pinned.find(clashes);
  while (clash) {
    startTime = addMinutes(clash.endTime, TRAVEL_BUFFER_MINUTES);
    endTime = addHours(startTime, hours);
    clash = pinned.find(clashes);
  }

  return { startTime, endTime };
}

/**
 * Name and opening-hours note follow the new start time
 */
function refreshForStart(
  activity: ScheduledActivity,
  place: Place,
  startTime: Date
): Pick<ScheduledActivity, "name" | "notes"> {
  const notes = activity.notes.filter((note) => !isOpeningHoursNote(note));
  const openingNote = checkOpeningHours(place.openingSchedule, toDateKey(startTime), minutesOfDay(startTime));
  if (openingNote) notes.push(openingNote);
  return { name: describeActivityName(place, startTime), notes };
}

/**
 * Reorder geo-located activities and recompute their times from the first
 * one's start: each runs for its stay and the next begins 30 minutes later.
 * A visit that would run into a pinned activity (an event, an overnight stay
 * or one without coordinates) moves to 30 minutes after it ends.
 * Everything is merged back and the day is sorted by start time.
 * Inputs are not mutated.
 */
export function optimizeRoute(
  activities: readonly ScheduledActivity[],
  placesById?: ReadonlyMap<string, Place>
): ScheduledActivity[] {
  const routable = activities.filter(isRoutable);
  const fixed = activities.filter((activity) => !isRoutable(activity));

  if (routable.length <= 2) {
    return [...activities].sort(byStartTime);
  }

  const ordered = orderByNearestNeighbor(routable);
  const pinned = [...fixed].sort(byStartTime);

  let cursor = ordered[0].startTime;
  const retimed = ordered.map((activity): ScheduledActivity => {
    const place = activity.placeId ? placesById?.get(activity.placeId) : undefined;
    const { startTime, endTime } = findFreeSlot(cursor, stayHoursFor(activity, place), pinned);
    cursor = addMinutes(endTime, TRAVEL_BUFFER_MINUTES);

    const moved = startTime.getTime() !== activity.startTime.getTime();
    return {
      ...activity,
      ...(moved && place ? refreshForStart(activity, place, startTime) : {}),
      startTime,
      endTime,
    };
  });

  console.log(`[RouteOptimizer] Reordered ${ordered.length} activities by proximity`);

  return [...retimed, ...fixed].sort(byStartTime);
}
