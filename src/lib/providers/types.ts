/**
 * Provider Types
 *
 * Shared types for all LLM providers.
 */

import type { AIProvider } from "../config";

// ===========================================
// Core Types
// ===========================================

export type { AIProvider, AIMode } from "../config";

export interface ChatMessage {
  role: "user" | "assistant" | "system";
  content: string;
}

// ===========================================
// Chat Options
// ===========================================

export interface ChatOptions {
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  jsonMode?: boolean;
  /** Extra fields recorded with the request log entry */
  logContext?: Record<string, unknown>;
}

export interface ChatResult {
  content: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

// ===========================================
// Provider Capabilities
// ===========================================

export interface ProviderCapabilities {
  supportsJsonMode: boolean;
  supportsSystemPrompt: boolean;
}

// ===========================================
// Health Check
// ===========================================

export interface HealthCheckResult {
  available: boolean;
  provider: AIProvider;
  model: string;
  error?: string;
}

// ===========================================
// Provider Interface
// ===========================================

export interface LLMProvider {
  readonly provider: AIProvider;
  readonly capabilities: ProviderCapabilities;

  /**
   * Get the model name
   */
  getModel(): string;

  /**
   * Simple chat completion
   */
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<string>;

  /**
   * Generate a JSON value. The result is untyped; callers validate it.
   */
  generateJSON(prompt: string, options?: ChatOptions): Promise<unknown>;

  /**
   * Health check
   */
  checkHealth(): Promise<HealthCheckResult>;
}
