/**
 * Content Generation Service
 *
 * Typed, schema-checked access to a generative provider. Each call site
 * names its task and supplies the zod schema its response must satisfy.
 */

import { z } from "zod";
import { getConfiguredProvider, type LLMProvider } from "./providers";
import { getSystemPrompt, type PromptName } from "./prompts";

// ===========================================
// Response Schemas
// ===========================================

export const dailyThemesSchema = z.object({
  themes: z.array(z.string()),
});

export const dayActivitiesSchema = z.object({
  activities: z.array(
    z.object({
      placeId: z.string().min(1),
      startTime: z.string().regex(/^([01]?\d|2[0-3]):([0-5]\d)$/, "startTime must be HH:MM"),
      durationHours: z.number().positive(),
    })
  ),
});

export const travelFaresSchema = z.object({
  averagePublicTransportFare: z.number().nonnegative(),
  baseTaxiFare: z.number().nonnegative(),
});

export type DayActivityEntry = z.infer<typeof dayActivitiesSchema>["activities"][number];
export type TravelFaresResponse = z.infer<typeof travelFaresSchema>;

// ===========================================
// Service Contract
// ===========================================

export interface GenerationRequest<T> {
  task: PromptName;
  prompt: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Recorded with the provider request log */
  logContext?: Record<string, unknown>;
}

export interface ContentGenerationService {
  generate<T>(request: GenerationRequest<T>): Promise<T>;
}

// ===========================================
// LLM-backed Implementation
// ===========================================

export class LLMContentGenerationService implements ContentGenerationService {
  constructor(
    private readonly provider: LLMProvider,
    private readonly temperature: number = 0.4,
    private readonly maxTokens: number = 2000
  ) {}

  async generate<T>(request: GenerationRequest<T>): Promise<T> {
    const raw = await this.provider.generateJSON(request.prompt, {
      systemPrompt: getSystemPrompt(request.task),
      temperature: this.temperature,
      maxTokens: this.maxTokens,
      logContext: { task: request.task, ...request.logContext },
    });

    const parsed = request.schema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw new Error(
        `Invalid ${request.task} response${where}: ${issue ? issue.message : "unknown schema error"}`
      );
    }

    return parsed.data;
  }
}

export function createContentGenerationService(
  provider: LLMProvider = getConfiguredProvider()
): ContentGenerationService {
  return new LLMContentGenerationService(provider);
}

// ===========================================
// Retry
// ===========================================

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Call the service up to `maxAttempts` times. Any thrown error, including a
 * schema mismatch, counts as a failed attempt. The last failure is rethrown
 * with the task name.
 */
export async function generateWithRetry<T>(
  service: ContentGenerationService,
  request: GenerationRequest<T>,
  maxAttempts: number
): Promise<T> {
  const attempts = Math.max(1, Math.floor(maxAttempts));
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await service.generate(request);
    } catch (error) {
      lastError = error;
      console.warn(
        `[ContentGeneration] ${request.task} attempt ${attempt}/${attempts} failed: ${errorMessage(error)}`
      );
    }
  }

  throw new Error(
    `${request.task} generation failed after ${attempts} attempts: ${errorMessage(lastError)}`
  );
}
