/**
 * Planner Configuration
 *
 * Reads planner settings from the environment. Entry points load `.env`
 * with dotenv before calling in here; library code never does.
 */

export type AIProvider = "openai" | "gemini";
export type AIMode = "prod" | "test";
export type BudgetExhaustedPolicy = "accept-best" | "fail";

export interface PlannerConfig {
  aiProvider: AIProvider;
  aiMode: AIMode;
  openaiModel: string;
  geminiModel: string;
  llmLogDir: string;
  llmLogEnabled: boolean;
  /** Upper bound on schedule builds in the replan loop */
  maxReplanAttempts: number;
  /** Attempts per content-generation call before giving up */
  collaboratorMaxAttempts: number;
  budgetExhaustedPolicy: BudgetExhaustedPolicy;
  defaultPublicTransportFare: number;
  defaultBaseTaxiFare: number;
  currencySymbol: string;
}

export const DEFAULT_PLANNER_CONFIG: PlannerConfig = {
  aiProvider: "openai",
  aiMode: "prod",
  openaiModel: "gpt-4o-mini",
  geminiModel: "gemini-2.5-flash",
  llmLogDir: "./llm-logs",
  llmLogEnabled: true,
  maxReplanAttempts: 5,
  collaboratorMaxAttempts: 3,
  budgetExhaustedPolicy: "accept-best",
  defaultPublicTransportFare: 2.5,
  defaultBaseTaxiFare: 1.5,
  currencySymbol: "€",
};

function readPositiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function readNonNegativeNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export function getConfiguredAIProvider(env: NodeJS.ProcessEnv = process.env): AIProvider {
  const provider = env.AI_PROVIDER?.toLowerCase();
  if (provider === "gemini" || provider === "google") return "gemini";
  return "openai";
}

export function getAIMode(env: NodeJS.ProcessEnv = process.env): AIMode {
  const mode = env.AI_MODE?.toLowerCase();
  if (mode === "test" || mode === "development" || mode === "dev") {
    return "test";
  }
  return "prod";
}

export function getPlannerConfig(env: NodeJS.ProcessEnv = process.env): PlannerConfig {
  const defaults = DEFAULT_PLANNER_CONFIG;
  return {
    aiProvider: getConfiguredAIProvider(env),
    aiMode: getAIMode(env),
    openaiModel: env.OPENAI_MODEL || defaults.openaiModel,
    geminiModel: env.GEMINI_MODEL || defaults.geminiModel,
    llmLogDir: env.LLM_LOG_DIR || defaults.llmLogDir,
    llmLogEnabled: env.LLM_LOG_ENABLED?.toLowerCase() !== "false",
    maxReplanAttempts: readPositiveInt(env.MAX_REPLAN_ATTEMPTS, defaults.maxReplanAttempts),
    collaboratorMaxAttempts: readPositiveInt(
      env.COLLABORATOR_MAX_ATTEMPTS,
      defaults.collaboratorMaxAttempts
    ),
    budgetExhaustedPolicy:
      env.BUDGET_EXHAUSTED_POLICY?.toLowerCase() === "fail" ? "fail" : "accept-best",
    defaultPublicTransportFare: readNonNegativeNumber(
      env.DEFAULT_PUBLIC_TRANSPORT_FARE,
      defaults.defaultPublicTransportFare
    ),
    defaultBaseTaxiFare: readNonNegativeNumber(
      env.DEFAULT_BASE_TAXI_FARE,
      defaults.defaultBaseTaxiFare
    ),
    currencySymbol: env.CURRENCY_SYMBOL || defaults.currencySymbol,
  };
}
