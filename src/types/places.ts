// ============================================
// PLACE TYPES
// ============================================
// Candidate places produced by upstream discovery. The engine only reads them.

export interface Coordinates {
  readonly latitude: number;
  readonly longitude: number;
}

export type Priority = "ESSENTIAL" | "HIGH" | "MEDIUM" | "LOW";

export const PRIORITY_ORDER: readonly Priority[] = ["ESSENTIAL", "HIGH", "MEDIUM", "LOW"];

/**
 * Opening hours keyed by day range ("Daily", "Weekends", "Thursday", "Monday-Friday")
 * with a "HH:MM-HH:MM" value or "Closed". An empty map means always open.
 */
export type OpeningSchedule = Readonly<Record<string, string>>;

interface PlaceBase {
  readonly id: string;
  readonly name: string;
  readonly coordinates?: Coordinates | null;
  readonly priority: Priority;
  /** Short reason why someone should go there */
  readonly reasonToGo: string;
  readonly website?: string;
  readonly bookingRequired?: boolean;
  readonly typicalHoursOfStay: number;
  readonly weatherDependent: boolean;
  readonly openingSchedule: OpeningSchedule;
}

export interface Landmark extends PlaceBase {
  readonly kind: "landmark";
}

export interface Establishment extends PlaceBase {
  readonly kind: "establishment";
  /** Per person */
  readonly averagePrice: number;
  /** e.g. Restaurant, Cafe, Bar */
  readonly establishmentType: string;
}

export interface Event extends PlaceBase {
  readonly kind: "event";
  /** Local wall-clock time, "YYYY-MM-DDTHH:MM" */
  readonly dateTime: string;
  readonly priceOptions: readonly number[];
}

export interface Accommodation extends PlaceBase {
  readonly kind: "accommodation";
  /** Nightly, per room */
  readonly priceOptions: readonly number[];
}

export type Place = Landmark | Establishment | Event | Accommodation;

export type PlaceKind = Place["kind"];

/**
 * Raw discovery output, one list per category
 */
export interface DestinationReport {
  landmarks: Landmark[];
  establishments: Establishment[];
  events: Event[];
  accommodations: Accommodation[];
}
