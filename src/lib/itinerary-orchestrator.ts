// ============================================
// ITINERARY ORCHESTRATOR SERVICE
// ============================================
// Drives the planning pipeline as an explicit state machine:
//
//   FILTER_PLACES → PLAN_THEMES → ALLOCATE_ACCOMMODATION → BUILD_SCHEDULES
//   → OPTIMIZE_ROUTES → CLASSIFY_SEGMENTS → VALIDATE_BUDGET → REPLAN | FINALIZE
//
// REPLAN loops back to BUILD_SCHEDULES with a tighter daily cap, at most
// maxReplanAttempts builds in total.

import type {
  BudgetTracker,
  DayItinerary,
  ScheduledActivity,
  TripItinerary,
} from "@/types/itinerary";
import type { Accommodation, Place } from "@/types/places";
import type { TripRequest } from "@/types/trip";
import { selectBestAccommodation, buildAccommodationStays } from "./accommodation-choice";
import { calculateDayCost, createBudgetBreakdown, validateBudget } from "./budget";
import { getPlannerConfig, type BudgetExhaustedPolicy, type PlannerConfig } from "./config";
import type { ContentGenerationService } from "./content-generation";
import { generateDailyThemes } from "./daily-themes";
import { indexPlaces, ofKind } from "./place-utils";
import { selectPlaces } from "./place-selector";
import { optimizeRoute } from "./route-optimizer";
import { DayScheduleBuilder, pickKeyHighlights, type DayPlanningPool } from "./schedule-builder";
import { addDays } from "./time-utils";
import {
  calculateTravelSegments,
  fetchFareOptions,
  type TravelSegmentOptions,
} from "./travel-segments";
import {
  getTotalDays,
  validateTripRequest,
  type TripValidationErrorCode,
} from "./trip-request";

// ============================================
// TYPES
// ============================================

export type PlanningStage =
  | "FILTER_PLACES"
  | "PLAN_THEMES"
  | "ALLOCATE_ACCOMMODATION"
  | "BUILD_SCHEDULES"
  | "OPTIMIZE_ROUTES"
  | "CLASSIFY_SEGMENTS"
  | "VALIDATE_BUDGET"
  | "REPLAN"
  | "FINALIZE";

/** Stages a build can fail in, including the ones before the pipeline */
export type BuildStage = "VALIDATE_REQUEST" | "DISCOVER_PLACES" | PlanningStage;

export type BuildErrorCode =
  | TripValidationErrorCode
  | "STARVED_SELECTION"
  | "NO_ACCOMMODATION"
  | "COLLABORATOR_FAILURE"
  | "BUDGET_EXCEEDED";

export interface BuildError {
  stage: BuildStage;
  code: BuildErrorCode;
  message: string;
}

export type ItineraryBuildResult =
  | { success: true; itinerary: TripItinerary }
  | { success: false; error: BuildError };

export interface OrchestratorOptions {
  /** Upper bound on schedule builds, the first one included */
  maxReplanAttempts: number;
  collaboratorMaxAttempts: number;
  budgetExhaustedPolicy: BudgetExhaustedPolicy;
  /** Used when fares cannot be looked up */
  defaultFares: TravelSegmentOptions;
  /** YYYY-MM-DD used to reject past trips; defaults to the current date */
  today?: string;
}

interface ScheduleAttempt {
  attempt: number;
  days: DayItinerary[];
  warnings: string[];
  tracker: BudgetTracker;
}

interface PlanningState {
  trip: TripRequest;
  places: readonly Place[];
  totalDays: number;
  workingSet: Place[];
  themes: string[];
  fares: TravelSegmentOptions;
  accommodation: Accommodation | null;
  accommodationStays: ScheduledActivity[];
  attempt: number;
  days: DayItinerary[];
  warnings: string[];
  best: ScheduleAttempt | null;
  chosen: ScheduleAttempt | null;
}

// ============================================
// HELPERS
// ============================================

export function optionsFromConfig(config: PlannerConfig): OrchestratorOptions {
  return {
    maxReplanAttempts: config.maxReplanAttempts,
    collaboratorMaxAttempts: config.collaboratorMaxAttempts,
    budgetExhaustedPolicy: config.budgetExhaustedPolicy,
    defaultFares: {
      averagePublicTransportFare: config.defaultPublicTransportFare,
      baseTaxiFare: config.defaultBaseTaxiFare,
      currencySymbol: config.currencySymbol,
    },
  };
}

/**
 * Spending cap per day for a build attempt. The first attempt is uncapped;
 * each later one shrinks the even daily share by 15%, down to 40% of it.
 */
export function dailyCapForAttempt(
  budget: number,
  totalDays: number,
  attempt: number
): number | undefined {
  if (attempt < 2) return undefined;
  const factor = Math.max(0.4, 1 - 0.15 * (attempt - 1));
  return (budget / totalDays) * factor;
}

function failure(stage: BuildStage, code: BuildErrorCode, message: string): ItineraryBuildResult {
  console.error(`[Orchestrator] ${stage} failed (${code}): ${message}`);
  return { success: false, error: { stage, code, message } };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================
// ORCHESTRATOR SERVICE
// ============================================

export class ItineraryOrchestrator {
  private readonly options: OrchestratorOptions;
  private readonly scheduleBuilder: DayScheduleBuilder;

  constructor(
    private readonly service: ContentGenerationService,
    options: Partial<OrchestratorOptions> = {}
  ) {
    this.options = { ...optionsFromConfig(getPlannerConfig()), ...options };
    this.scheduleBuilder = new DayScheduleBuilder(service, this.options.collaboratorMaxAttempts);
  }

  /**
   * Build a complete itinerary from a trip request and the discovered places
   */
  async buildItinerary(trip: TripRequest, places: readonly Place[]): Promise<ItineraryBuildResult> {
    const startTime = Date.now();

    const validation = validateTripRequest(trip, this.options.today);
    if (!validation.valid) {
      return failure("VALIDATE_REQUEST", validation.error.code, validation.error.message);
    }

    const state: PlanningState = {
      trip,
      places,
      totalDays: getTotalDays(trip),
      workingSet: [],
      themes: [],
      fares: this.options.defaultFares,
      accommodation: null,
      accommodationStays: [],
      attempt: 0,
      days: [],
      warnings: [],
      best: null,
      chosen: null,
    };

    let stage: PlanningStage = "FILTER_PLACES";

    while (stage !== "FINALIZE") {
      console.log(`[Orchestrator] ${stage}`);

      switch (stage) {
        case "FILTER_PLACES": {
          state.workingSet = selectPlaces(places, trip);
          if (state.workingSet.length === 0) {
            return failure(stage, "STARVED_SELECTION", "No places available to plan with.");
          }
          stage = "PLAN_THEMES";
          break;
        }

        case "PLAN_THEMES": {
          state.themes = await generateDailyThemes(
            this.service,
            trip,
            state.workingSet,
            this.options.collaboratorMaxAttempts
          );
          state.fares = await fetchFareOptions(
            this.service,
            trip.destination,
            this.options.collaboratorMaxAttempts,
            this.options.defaultFares
          );
          stage = "ALLOCATE_ACCOMMODATION";
          break;
        }

        case "ALLOCATE_ACCOMMODATION": {
          const selected = ofKind(state.workingSet, "accommodation");
          const candidates = selected.length > 0 ? selected : ofKind(places, "accommodation");
          const accommodation = selectBestAccommodation(candidates, trip);
          if (!accommodation) {
            return failure(stage, "NO_ACCOMMODATION", "No accommodation was found for this trip.");
          }
          state.accommodation = accommodation;
          state.accommodationStays = buildAccommodationStays(accommodation, trip);
          stage = "BUILD_SCHEDULES";
          break;
        }

        case "BUILD_SCHEDULES": {
          state.attempt++;
          try {
            await this.buildSchedules(state);
          } catch (error) {
            return failure(stage, "COLLABORATOR_FAILURE", errorMessage(error));
          }
          stage = "OPTIMIZE_ROUTES";
          break;
        }

        case "OPTIMIZE_ROUTES": {
          const placesById = indexPlaces(state.workingSet);
          state.days = state.days.map((day) => ({
            ...day,
            activities: optimizeRoute(day.activities, placesById),
          }));
          stage = "CLASSIFY_SEGMENTS";
          break;
        }

        case "CLASSIFY_SEGMENTS": {
          state.days = state.days.map((day) => {
            const travelSegments = calculateTravelSegments(day.activities, state.fares);
            return {
              ...day,
              travelSegments,
              totalEstimatedCost: calculateDayCost(day.activities, travelSegments),
              keyHighlights: pickKeyHighlights(day.activities),
            };
          });
          stage = "VALIDATE_BUDGET";
          break;
        }

        case "VALIDATE_BUDGET": {
          const tracker = validateBudget(trip, state.days);
          const current: ScheduleAttempt = {
            attempt: state.attempt,
            days: state.days,
            warnings: state.warnings,
            tracker,
          };
          const best =
            state.best && state.best.tracker.totalEstimatedCost <= tracker.totalEstimatedCost
              ? state.best
              : current;
          state.best = best;

          console.log(
            `[Orchestrator] Attempt ${state.attempt}: ${tracker.totalEstimatedCost.toFixed(2)} of ${trip.budget.toFixed(2)}${tracker.isOverBudget ? " (over budget)" : ""}`
          );

          if (!tracker.isOverBudget) {
            state.chosen = current;
            stage = "FINALIZE";
          } else if (state.attempt < this.options.maxReplanAttempts) {
            stage = "REPLAN";
          } else if (this.options.budgetExhaustedPolicy === "fail") {
            return failure(
              stage,
              "BUDGET_EXCEEDED",
              `Every one of ${state.attempt} attempts exceeded the budget of ${trip.budget}; cheapest came to ${best.tracker.totalEstimatedCost}.`
            );
          } else {
            console.warn(
              `[Orchestrator] Budget still exceeded after ${state.attempt} attempts, keeping the cheapest (attempt ${best.attempt})`
            );
            state.chosen = best;
            stage = "FINALIZE";
          }
          break;
        }

        case "REPLAN": {
          const cap = dailyCapForAttempt(trip.budget, state.totalDays, state.attempt + 1);
          console.log(
            `[Orchestrator] Replanning with a daily cap of ${cap === undefined ? "none" : cap.toFixed(2)}`
          );
          stage = "BUILD_SCHEDULES";
          break;
        }
      }
    }

    const itinerary = this.finalize(state);
    if (!itinerary) {
      return failure("FINALIZE", "NO_ACCOMMODATION", "Planning finished without an accommodation.");
    }

    console.log(
      `[Orchestrator] Built ${itinerary.totalDays}-day itinerary for ${trip.destination} in ${Date.now() - startTime}ms`
    );
    return { success: true, itinerary };
  }

  // ============================================
  // STAGES
  // ============================================

  /**
   * Build every day in order. Each day draws from what earlier days left in
   * the pool; a new attempt starts again from the full working set.
   */
  private async buildSchedules(state: PlanningState): Promise<void> {
    const { trip, totalDays, workingSet, themes } = state;
    const dailyBudgetCap = dailyCapForAttempt(trip.budget, totalDays, state.attempt);

    let pool: DayPlanningPool = { remaining: workingSet };
    const days: DayItinerary[] = [];
    const warnings: string[] = [];

    for (let i = 0; i < totalDays; i++) {
      const result = await this.scheduleBuilder.buildDay({
        trip,
        date: addDays(trip.startDate, i),
        dayNumber: i + 1,
        theme: themes[i],
        workingSet,
        pool,
        dailyBudgetCap,
      });
      days.push(result.day);
      warnings.push(...result.warnings);
      pool = result.nextPool;
    }

    state.days = days;
    state.warnings = warnings;
  }

  private finalize(state: PlanningState): TripItinerary | null {
    const { trip, accommodation, chosen } = state;
    if (!accommodation || !chosen) return null;

    const warnings = [...chosen.warnings];
    if (chosen.tracker.isOverBudget) {
      warnings.push(
        `Estimated cost ${chosen.tracker.totalEstimatedCost.toFixed(2)} exceeds the budget of ${trip.budget.toFixed(2)}`
      );
    }

    return {
      destination: trip.destination,
      startDate: trip.startDate,
      endDate: trip.endDate,
      totalDays: state.totalDays,
      days: chosen.days,
      accommodation,
      accommodationStays: state.accommodationStays,
      totalEstimatedCost: chosen.tracker.totalEstimatedCost,
      budgetBreakdown: createBudgetBreakdown(accommodation, chosen.days, trip.travelers),
      budgetStatus: {
        limit: trip.budget,
        attempts: state.attempt,
        isOverBudget: chosen.tracker.isOverBudget,
      },
      warnings,
    };
  }
}

// ============================================
// FACTORY
// ============================================

export function createItineraryOrchestrator(
  service: ContentGenerationService,
  options?: Partial<OrchestratorOptions>
): ItineraryOrchestrator {
  return new ItineraryOrchestrator(service, options);
}
