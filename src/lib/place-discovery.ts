/**
 * Place Discovery
 *
 * Contract for the services that find candidate places for a destination,
 * an in-memory implementation, and the TripPlanner that ties discovery to
 * the itinerary orchestrator.
 */

import type {
  Accommodation,
  DestinationReport,
  Establishment,
  Event,
  Landmark,
  Place,
} from "@/types/places";
import type { TripRequest } from "@/types/trip";
import type { ItineraryBuildResult, ItineraryOrchestrator } from "./itinerary-orchestrator";
import { eventDateKey } from "./schedule-builder";
import { validateTripRequest } from "./trip-request";

export const DEFAULT_SEARCH_RADIUS_KM = 5;

// ===========================================
// Discovery Contract
// ===========================================

export interface DiscoveryQuery {
  destination: string;
  startDate: string;
  endDate: string;
  radiusKm: number;
}

export interface PlaceDiscoveryService {
  findLandmarks(query: DiscoveryQuery): Promise<Landmark[]>;
  findEstablishments(query: DiscoveryQuery): Promise<Establishment[]>;
  findEvents(query: DiscoveryQuery): Promise<Event[]>;
  findAccommodations(query: DiscoveryQuery): Promise<Accommodation[]>;
}

/**
 * Query all four categories at once; they do not depend on each other
 */
export async function collectDestinationReport(
  discovery: PlaceDiscoveryService,
  query: DiscoveryQuery
): Promise<DestinationReport> {
  const [landmarks, establishments, events, accommodations] = await Promise.all([
    discovery.findLandmarks(query),
    discovery.findEstablishments(query),
    discovery.findEvents(query),
    discovery.findAccommodations(query),
  ]);

  console.log(
    `[Discovery] ${query.destination}: ${landmarks.length} landmarks, ${establishments.length} establishments, ${events.length} events, ${accommodations.length} accommodations`
  );

  return { landmarks, establishments, events, accommodations };
}

export function flattenReport(report: DestinationReport): Place[] {
  return [...report.landmarks, ...report.establishments, ...report.events, ...report.accommodations];
}

// ===========================================
// In-memory Discovery
// ===========================================

/**
 * Serves a fixed report. Events outside the queried dates are left out.
 */
export class InMemoryPlaceDiscovery implements PlaceDiscoveryService {
  constructor(private readonly report: DestinationReport) {}

  async findLandmarks(): Promise<Landmark[]> {
    return [...this.report.landmarks];
  }

  async findEstablishments(): Promise<Establishment[]> {
    return [...this.report.establishments];
  }

  async findEvents(query: DiscoveryQuery): Promise<Event[]> {
    return this.report.events.filter((event) => {
      const date = eventDateKey(event);
      return date !== null && date >= query.startDate && date <= query.endDate;
    });
  }

  async findAccommodations(): Promise<Accommodation[]> {
    return [...this.report.accommodations];
  }
}

// ===========================================
// Trip Planner
// ===========================================

export class TripPlanner {
  constructor(
    private readonly discovery: PlaceDiscoveryService,
    private readonly orchestrator: ItineraryOrchestrator,
    private readonly radiusKm: number = DEFAULT_SEARCH_RADIUS_KM,
    private readonly today?: string
  ) {}

  /**
   * Validate the request, discover places and build the itinerary
   */
  async planTrip(request: TripRequest): Promise<ItineraryBuildResult> {
    const validation = validateTripRequest(request, this.today);
    if (!validation.valid) {
      console.log(`[TripPlanner] Rejected request: ${validation.error.message}`);
      return { success: false, error: { stage: "VALIDATE_REQUEST", ...validation.error } };
    }

    let report: DestinationReport;
    try {
      report = await collectDestinationReport(this.discovery, {
        destination: request.destination,
        startDate: request.startDate,
        endDate: request.endDate,
        radiusKm: this.radiusKm,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[TripPlanner] Place discovery failed: ${message}`);
      return {
        success: false,
        error: { stage: "DISCOVER_PLACES", code: "COLLABORATOR_FAILURE", message },
      };
    }

    return this.orchestrator.buildItinerary(request, flattenReport(report));
  }
}
