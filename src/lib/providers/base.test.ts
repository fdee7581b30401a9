import { describe, it, expect, vi, afterEach } from "vitest";
import {
  BaseProvider,
  clearProviderCache,
  createGeminiProvider,
  createOpenAIProvider,
  getProvider,
  hasProvider,
  registerProvider,
} from ".";
import type {
  AIProvider,
  ChatMessage,
  ChatOptions,
  ChatResult,
  HealthCheckResult,
  ProviderCapabilities,
} from "./types";

/**
 * Replies with queued strings (or throws queued errors) instead of calling an API
 */
class ScriptedProvider extends BaseProvider {
  readonly provider: AIProvider = "openai";
  readonly capabilities: ProviderCapabilities = { supportsJsonMode: true, supportsSystemPrompt: true };
  readonly received: { messages: ChatMessage[]; options?: ChatOptions }[] = [];

  constructor(private readonly replies: (string | Error)[]) {
    super();
  }

  getModel(): string {
    return "scripted-model";
  }

  protected async callChat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResult> {
    this.received.push({ messages, options });
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error("No scripted reply left");
    if (reply instanceof Error) throw reply;
    return { content: reply };
  }

  async checkHealth(): Promise<HealthCheckResult> {
    return { available: true, provider: this.provider, model: this.getModel() };
  }
}

describe("BaseProvider.chat", () => {
  it("puts the system prompt first", async () => {
    const provider = new ScriptedProvider(["hello"]);
    await expect(
      provider.chat([{ role: "user", content: "hi" }], { systemPrompt: "Be brief." })
    ).resolves.toBe("hello");

    expect(provider.received[0].messages).toEqual([
      { role: "system", content: "Be brief." },
      { role: "user", content: "hi" },
    ]);
  });

  it("keeps an existing system message", async () => {
    const provider = new ScriptedProvider(["hello"]);
    const messages: ChatMessage[] = [
      { role: "system", content: "Original." },
      { role: "user", content: "hi" },
    ];
    await provider.chat(messages, { systemPrompt: "Ignored." });
    expect(provider.received[0].messages).toEqual(messages);
  });

  it("rethrows provider errors", async () => {
    const provider = new ScriptedProvider([new Error("401 Unauthorized")]);
    await expect(provider.chat([{ role: "user", content: "hi" }])).rejects.toThrow("401 Unauthorized");
  });
});

describe("BaseProvider.generateJSON", () => {
  async function parse(reply: string): Promise<unknown> {
    return new ScriptedProvider([reply]).generateJSON("prompt");
  }

  it("asks for JSON mode when the provider supports it", async () => {
    const provider = new ScriptedProvider(['{"ok":true}']);
    await provider.generateJSON("prompt", { temperature: 0.1 });
    expect(provider.received[0].options).toEqual({ temperature: 0.1, jsonMode: true });
  });

  it("parses plain JSON", async () => {
    await expect(parse('{"themes":["Old Town"]}')).resolves.toEqual({ themes: ["Old Town"] });
  });

  it("extracts JSON from a fenced code block", async () => {
    await expect(parse('Here you go:\n```json\n{"a": 1}\n```\nEnjoy!')).resolves.toEqual({ a: 1 });
  });

  it("extracts JSON surrounded by prose", async () => {
    await expect(parse('Sure! {"a": [1, 2]} Hope that helps.')).resolves.toEqual({ a: [1, 2] });
  });

  it("repairs trailing commas", async () => {
    await expect(parse('{"a": 1, "b": [2, 3,],}')).resolves.toEqual({ a: 1, b: [2, 3] });
  });

  it("closes truncated output", async () => {
    await expect(parse('{"themes": ["Old Town", "Markets"')).resolves.toEqual({
      themes: ["Old Town", "Markets"],
    });
  });

  it("fails on text without JSON", async () => {
    await expect(parse("I cannot help with that.")).rejects.toThrow(
      "Failed to parse JSON response from openai"
    );
  });
});

describe("provider health", () => {
  const previousKey = process.env.GEMINI_API_KEY;

  afterEach(() => {
    process.env.GEMINI_API_KEY = previousKey;
  });

  it("is available when the API key is set", async () => {
    await expect(createOpenAIProvider("gpt-test").checkHealth()).resolves.toEqual({
      available: true,
      provider: "openai",
      model: "gpt-test",
    });
  });

  it("reports a missing API key", async () => {
    delete process.env.GEMINI_API_KEY;
    await expect(createGeminiProvider("gemini-test").checkHealth()).resolves.toEqual({
      available: false,
      provider: "gemini",
      model: "gemini-test",
      error: "GEMINI_API_KEY not configured",
    });
  });
});

describe("provider registry", () => {
  afterEach(() => {
    clearProviderCache();
  });

  it("has the built-in providers registered", () => {
    expect(hasProvider("openai")).toBe(true);
    expect(hasProvider("gemini")).toBe(true);
  });

  it("creates each provider once until the cache is cleared", () => {
    const factory = vi.fn(() => new ScriptedProvider([]));
    registerProvider("gemini", factory);

    const first = getProvider("gemini");
    expect(getProvider("gemini")).toBe(first);
    expect(factory).toHaveBeenCalledTimes(1);

    clearProviderCache();
    expect(getProvider("gemini")).not.toBe(first);
    expect(factory).toHaveBeenCalledTimes(2);
  });
});
