/**
 * Trip Input
 *
 * zod schemas for trip requests and discovered place lists supplied as JSON
 * (script input files, fixtures).
 */

import { z } from "zod";
import type { DestinationReport } from "@/types/places";
import type { TripRequest } from "@/types/trip";

const coordinatesSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

const placeBaseSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  coordinates: coordinatesSchema.nullable().optional(),
  priority: z.enum(["ESSENTIAL", "HIGH", "MEDIUM", "LOW"]),
  reasonToGo: z.string().default(""),
  website: z.string().optional(),
  bookingRequired: z.boolean().optional(),
  typicalHoursOfStay: z.number().nonnegative().default(0),
  weatherDependent: z.boolean().default(false),
  openingSchedule: z.record(z.string()).default({}),
});

const landmarkSchema = placeBaseSchema.extend({
  kind: z.literal("landmark"),
});

const establishmentSchema = placeBaseSchema.extend({
  kind: z.literal("establishment"),
  averagePrice: z.number().nonnegative(),
  establishmentType: z.string(),
});

const eventSchema = placeBaseSchema.extend({
  kind: z.literal("event"),
  dateTime: z.string().regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}/, "dateTime must be YYYY-MM-DDTHH:MM"),
  priceOptions: z.array(z.number().nonnegative()),
});

const accommodationSchema = placeBaseSchema.extend({
  kind: z.literal("accommodation"),
  priceOptions: z.array(z.number().nonnegative()),
});

export const destinationReportSchema = z.object({
  landmarks: z.array(landmarkSchema).default([]),
  establishments: z.array(establishmentSchema).default([]),
  events: z.array(eventSchema).default([]),
  accommodations: z.array(accommodationSchema).default([]),
});

export const tripRequestSchema = z.object({
  destination: z.string(),
  startDate: z.string(),
  endDate: z.string(),
  budget: z.number(),
  travelers: z.number(),
  groupType: z.enum(["SOLO", "COUPLE", "FRIENDS", "GROUP"]),
  interests: z.array(z.string()),
});

export const tripInputSchema = z.object({
  request: tripRequestSchema,
  places: destinationReportSchema,
});

export interface TripInput {
  request: TripRequest;
  places: DestinationReport;
}

/**
 * Parse a trip input document; throws with the first problem found
 */
export function parseTripInput(data: unknown): TripInput {
  const parsed = tripInputSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid trip input at ${issue.path.join(".") || "root"}: ${issue.message}`);
  }
  return parsed.data;
}
