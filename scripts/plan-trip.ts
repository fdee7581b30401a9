#!/usr/bin/env node

/**
 * Trip Planning CLI
 *
 * Plans an itinerary for a trip request and place list read from a JSON file,
 * using the configured AI provider, and prints the result as JSON.
 *
 * Usage:
 *   npx tsx scripts/plan-trip.ts [input.json]
 *
 * The input defaults to scripts/fixtures/sample-trip.json. Provider settings
 * come from the environment or a .env file (AI_PROVIDER, OPENAI_API_KEY, ...).
 */

import { config } from "dotenv";
import { promises as fs } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { createContentGenerationService } from "../src/lib/content-generation";
import { createItineraryOrchestrator } from "../src/lib/itinerary-orchestrator";
import { InMemoryPlaceDiscovery, TripPlanner } from "../src/lib/place-discovery";
import { checkProviderHealth } from "../src/lib/providers";
import { parseTripInput } from "../src/lib/trip-input";

config();

const DEFAULT_INPUT = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  "fixtures",
  "sample-trip.json"
);

async function main(): Promise<void> {
  const inputPath = process.argv[2] ?? DEFAULT_INPUT;

  const health = await checkProviderHealth();
  if (!health.available) {
    console.error(`Provider ${health.provider} is not available: ${health.error ?? "unknown error"}`);
    process.exitCode = 1;
    return;
  }

  const input = parseTripInput(JSON.parse(await fs.readFile(inputPath, "utf-8")));
  console.error(`Planning ${input.request.destination} with ${health.provider} (${health.model})`);

  const planner = new TripPlanner(
    new InMemoryPlaceDiscovery(input.places),
    createItineraryOrchestrator(createContentGenerationService())
  );

  const result = await planner.planTrip(input.request);
  if (!result.success) {
    console.error(`Planning failed at ${result.error.stage} (${result.error.code}): ${result.error.message}`);
    process.exitCode = 1;
    return;
  }

  process.stdout.write(JSON.stringify(result.itinerary, null, 2) + "\n");
}

main().catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
