/**
 * Gemini Provider
 *
 * Chat and JSON generation against Google Gemini.
 */

import { GoogleGenerativeAI, HarmBlockThreshold, HarmCategory } from "@google/generative-ai";
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
// Gemini Provider Implementation
// ===========================================

export class GeminiProvider extends BaseProvider {
  readonly provider: AIProvider = "gemini";
  readonly capabilities: ProviderCapabilities = {
    supportsJsonMode: true,
    supportsSystemPrompt: true,
  };

  private client: GoogleGenerativeAI | null = null;
  private model: string;

  private safetySettings = [
    HarmCategory.HARM_CATEGORY_HARASSMENT,
    HarmCategory.HARM_CATEGORY_HATE_SPEECH,
    HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT,
    HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT,
  ].map((category) => ({ category, threshold: HarmBlockThreshold.BLOCK_ONLY_HIGH }));

  constructor(model: string = getPlannerConfig().geminiModel) {
    super();
    this.model = model;
  }

  getModel(): string {
    return this.model;
  }

  private getClient(): GoogleGenerativeAI {
    if (!this.client) {
      const apiKey = process.env.GEMINI_API_KEY;
      if (!apiKey) {
        throw new Error("GEMINI_API_KEY is required for Gemini provider");
      }
      this.client = new GoogleGenerativeAI(apiKey);
    }
    return this.client;
  }

  protected async callChat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResult> {
    const client = this.getClient();

    // Gemini takes the system prompt separately
    const systemMessage = messages.find((m) => m.role === "system");
    const chatMessages = messages.filter((m) => m.role !== "system");

    const geminiModel = client.getGenerativeModel({
      model: this.model,
      safetySettings: this.safetySettings,
      generationConfig: {
        temperature: options?.temperature ?? 0.7,
        maxOutputTokens: options?.maxTokens ?? 1000,
        ...(options?.jsonMode && { responseMimeType: "application/json" }),
      },
    });

    const contents = chatMessages.map((m) => ({
      role: m.role === "assistant" ? "model" : "user",
      parts: [{ text: m.content }],
    }));

    const result = await geminiModel.generateContent({
      contents,
      ...(systemMessage && { systemInstruction: systemMessage.content }),
    });

    const response = result.response;

    return {
      content: response.text() || "",
      usage: response.usageMetadata
        ? {
            promptTokens: response.usageMetadata.promptTokenCount || 0,
            completionTokens: response.usageMetadata.candidatesTokenCount || 0,
            totalTokens: response.usageMetadata.totalTokenCount || 0,
          }
        : undefined,
    };
  }

  async checkHealth(): Promise<HealthCheckResult> {
    if (!process.env.GEMINI_API_KEY) {
      return {
        available: false,
        provider: this.provider,
        model: this.model,
        error: "GEMINI_API_KEY not configured",
      };
    }

    return { available: true, provider: this.provider, model: this.model };
  }
}

// ===========================================
// Factory
// ===========================================

export function createGeminiProvider(model?: string): GeminiProvider {
  return new GeminiProvider(model);
}

registerProvider("gemini", () => createGeminiProvider());
