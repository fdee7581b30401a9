/**
 * Providers Module Index
 *
 * Unified LLM provider interface for OpenAI and Gemini.
 *
 * Usage:
 *   import { getProvider, getConfiguredProvider } from "./providers";
 *
 *   const provider = getConfiguredProvider();
 *   const json = await provider.generateJSON(prompt, { systemPrompt });
 */

export * from "./types";

export {
  BaseProvider,
  getProvider,
  hasProvider,
  registerProvider,
  clearProviderCache,
} from "./base";

// Import providers to register them
import "./openai";
import "./gemini";

export { OpenAIProvider, createOpenAIProvider } from "./openai";
export { GeminiProvider, createGeminiProvider } from "./gemini";

// ===========================================
// Convenience Functions
// ===========================================

import { getConfiguredAIProvider } from "../config";
import { getProvider } from "./base";
import type { HealthCheckResult, LLMProvider } from "./types";

/**
 * Get the LLM provider instance based on environment configuration
 */
export function getConfiguredProvider(): LLMProvider {
  return getProvider(getConfiguredAIProvider());
}

export async function checkProviderHealth(): Promise<HealthCheckResult> {
  return getConfiguredProvider().checkHealth();
}
