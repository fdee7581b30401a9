/**
 * Base Provider
 *
 * Abstract base class for all LLM providers.
 * Handles request logging and, in test mode, replay of recorded responses.
 */

import { getAIMode } from "../config";
import {
  createLogEntry,
  findReplayMatch,
  isLoggingEnabled,
  logLLMRequest,
  type LLMLogEntry,
} from "../llm-request-logger";
import type {
  AIProvider,
  ChatMessage,
  ChatOptions,
  ChatResult,
  HealthCheckResult,
  LLMProvider,
  ProviderCapabilities,
} from "./types";

const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_MAX_TOKENS = 1000;

// ===========================================
// Abstract Base Provider
// ===========================================

export abstract class BaseProvider implements LLMProvider {
  abstract readonly provider: AIProvider;
  abstract readonly capabilities: ProviderCapabilities;

  abstract getModel(): string;

  // Each provider implements the raw API call
  protected abstract callChat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResult>;

  abstract checkHealth(): Promise<HealthCheckResult>;

  // ===========================================
  // Public API (with logging built-in)
  // ===========================================

  async chat(messages: ChatMessage[], options?: ChatOptions): Promise<string> {
    const startTime = Date.now();
    const allMessages = this.buildMessagesWithSystem(messages, options?.systemPrompt);
    const loggingEnabled = isLoggingEnabled();

    if (getAIMode() === "test" && loggingEnabled) {
      console.log(`[${this.provider}] Test mode - checking for replay match...`);
      const replayMatch = await findReplayMatch(this.provider, allMessages);
      if (replayMatch.found && replayMatch.entry) {
        console.log(`[${this.provider}] Replay match found! Using recorded response.`);
        return replayMatch.entry.response.content;
      }
    }

    const temperature = options?.temperature ?? DEFAULT_TEMPERATURE;
    const maxTokens = options?.maxTokens ?? DEFAULT_MAX_TOKENS;
    const request: LLMLogEntry["request"] = {
      model: this.getModel(),
      messages: allMessages,
      temperature,
      max_tokens: maxTokens,
      json_mode: options?.jsonMode ?? false,
    };

    console.log(
      `[${this.provider}] Request: model=${this.getModel()}, messages=${allMessages.length}, temp=${temperature}, maxTokens=${maxTokens}, jsonMode=${options?.jsonMode ?? false}`
    );

    try {
      const result = await this.callChat(allMessages, options);
      const durationMs = Date.now() - startTime;

      if (loggingEnabled) {
        const logEntry = createLogEntry(
          this.provider,
          request,
          {
            content: result.content,
            usage: result.usage
              ? {
                  prompt_tokens: result.usage.promptTokens,
                  completion_tokens: result.usage.completionTokens,
                  total_tokens: result.usage.totalTokens,
                }
              : undefined,
          },
          durationMs,
          true,
          undefined,
          options?.logContext
        );
        this.persistLog(logEntry);
      }

      console.log(
        `[${this.provider}] Response in ${durationMs}ms` +
          (result.usage ? ` (tokens: ${result.usage.totalTokens})` : "")
      );

      return result.content;
    } catch (error) {
      const durationMs = Date.now() - startTime;
      const errorMessage = error instanceof Error ? error.message : "Unknown error";

      if (loggingEnabled) {
        this.persistLog(
          createLogEntry(
            this.provider,
            request,
            { content: "" },
            durationMs,
            false,
            errorMessage,
            options?.logContext
          )
        );
      }

      throw error;
    }
  }

  async generateJSON(prompt: string, options?: ChatOptions): Promise<unknown> {
    const response = await this.chat([{ role: "user", content: prompt }], {
      ...options,
      jsonMode: this.capabilities.supportsJsonMode,
    });

    return this.parseJson(response);
  }

  // ===========================================
  // Helpers
  // ===========================================

  protected buildMessagesWithSystem(messages: ChatMessage[], systemPrompt?: string): ChatMessage[] {
    if (!systemPrompt || messages.some((m) => m.role === "system")) {
      return messages;
    }
    return [{ role: "system", content: systemPrompt }, ...messages];
  }

  protected parseJson(content: string): unknown {
    try {
      return JSON.parse(content);
    } catch {
      const extracted = this.extractJsonFromResponse(content);
      try {
        return JSON.parse(extracted);
      } catch {
        try {
          return JSON.parse(this.repairJson(extracted));
        } catch {
          throw new Error(`Failed to parse JSON response from ${this.provider}`);
        }
      }
    }
  }

  protected extractJsonFromResponse(content: string): string {
    // Try to find JSON in code blocks
    const codeBlockMatch = content.match(/```(?:json)?\s*([\s\S]*?)```/);
    if (codeBlockMatch) {
      return codeBlockMatch[1].trim();
    }

    // Try to find JSON between braces
    const jsonMatch = content.match(/\{[\s\S]*\}/);
    if (jsonMatch) {
      return jsonMatch[0];
    }

    return content.trim();
  }

  protected repairJson(jsonStr: string): string {
    let repaired = jsonStr.trim();

    // Remove trailing commas before } or ]
    repaired = repaired.replace(/,(\s*[}\]])/g, "$1");

    const openBrackets = (repaired.match(/\[/g) || []).length;
    const closeBrackets = (repaired.match(/\]/g) || []).length;
    for (let i = 0; i < openBrackets - closeBrackets; i++) {
      repaired += "]";
    }

    const openBraces = (repaired.match(/\{/g) || []).length;
    const closeBraces = (repaired.match(/\}/g) || []).length;
    for (let i = 0; i < openBraces - closeBraces; i++) {
      repaired += "}";
    }

    return repaired;
  }

  private persistLog(entry: LLMLogEntry): void {
    logLLMRequest(entry).catch((error: unknown) => {
      console.error(`[${this.provider}] Failed to write request log:`, error);
    });
  }
}

// ===========================================
// Provider Registry
// ===========================================

const providerRegistry: Map<AIProvider, () => LLMProvider> = new Map();
const providerCache: Map<AIProvider, LLMProvider> = new Map();

export function registerProvider(provider: AIProvider, factory: () => LLMProvider): void {
  providerRegistry.set(provider, factory);
}

export function getProvider(provider: AIProvider): LLMProvider {
  const cached = providerCache.get(provider);
  if (cached) {
    return cached;
  }

  const factory = providerRegistry.get(provider);
  if (!factory) {
    throw new Error(`No provider registered for: ${provider}`);
  }

  const instance = factory();
  providerCache.set(provider, instance);
  return instance;
}

export function hasProvider(provider: AIProvider): boolean {
  return providerRegistry.has(provider);
}

/**
 * Clear the provider cache to force re-creation of providers.
 * Useful for testing when environment variables change.
 */
export function clearProviderCache(): void {
  providerCache.clear();
}
