// ============================================
// TRIP REQUEST TYPES
// ============================================

export type GroupType = "SOLO" | "COUPLE" | "FRIENDS" | "GROUP";

export const GROUP_TYPES: readonly GroupType[] = ["SOLO", "COUPLE", "FRIENDS", "GROUP"];

export interface TripRequest {
  destination: string;
  /** ISO date, YYYY-MM-DD */
  startDate: string;
  /** ISO date, YYYY-MM-DD, strictly after startDate */
  endDate: string;
  /** Total trip budget, currency-agnostic */
  budget: number;
  travelers: number;
  groupType: GroupType;
  interests: string[];
}
