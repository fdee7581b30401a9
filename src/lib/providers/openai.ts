/**
 * OpenAI Provider
 *
 * Chat and JSON generation against the OpenAI chat completions API.
 */

import OpenAI from "openai";
import { getPlannerConfig } from "../config";
import { BaseProvider, registerProvider } from "./base";
import type {
  AIProvider,
  ChatMessage,
  ChatOptions,
  ChatResult,
  HealthCheckResult,
  ProviderCapabilities,
} from "./types";

// ===========================================
// OpenAI Provider Implementation
// ===========================================

export class OpenAIProvider extends BaseProvider {
  readonly provider: AIProvider = "openai";
  readonly capabilities: ProviderCapabilities = {
    supportsJsonMode: true,
    supportsSystemPrompt: true,
  };

  private client: OpenAI | null = null;
  private model: string;

  constructor(model: string = getPlannerConfig().openaiModel) {
    super();
    this.model = model;
  }

  getModel(): string {
    return this.model;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      const apiKey = process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new Error("OPENAI_API_KEY is required for OpenAI provider");
      }
      this.client = new OpenAI({ apiKey });
    }
    return this.client;
  }

  protected async callChat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResult> {
    const client = this.getClient();

    const requestOptions: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: messages.map((m) => ({ role: m.role, content: m.content })),
      temperature: options?.temperature ?? 0.7,
      max_tokens: options?.maxTokens ?? 1000,
    };

    if (options?.jsonMode) {
      requestOptions.response_format = { type: "json_object" };
    }

    const response = await client.chat.completions.create(requestOptions);

    return {
      content: response.choices[0]?.message?.content || "",
      usage: response.usage
        ? {
            promptTokens: response.usage.prompt_tokens,
            completionTokens: response.usage.completion_tokens,
            totalTokens: response.usage.total_tokens,
          }
        : undefined,
    };
  }

  async checkHealth(): Promise<HealthCheckResult> {
    if (!process.env.OPENAI_API_KEY) {
      return {
        available: false,
        provider: this.provider,
        model: this.model,
        error: "OPENAI_API_KEY not configured",
      };
    }

    return { available: true, provider: this.provider, model: this.model };
  }
}

// ===========================================
// Factory
// ===========================================

export function createOpenAIProvider(model?: string): OpenAIProvider {
  return new OpenAIProvider(model);
}

registerProvider("openai", () => createOpenAIProvider());
