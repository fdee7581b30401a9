import { describe, it, expect } from "vitest";
import {
  DEFAULT_PLANNER_CONFIG,
  getAIMode,
  getConfiguredAIProvider,
  getPlannerConfig,
} from "./config";

describe("getConfiguredAIProvider", () => {
  it.each([
    [undefined, "openai"],
    ["OpenAI", "openai"],
    ["gemini", "gemini"],
    ["Google", "gemini"],
    ["something-else", "openai"],
  ])("AI_PROVIDER=%s -> %s", (value, expected) => {
    expect(getConfiguredAIProvider({ AI_PROVIDER: value })).toBe(expected);
  });
});

describe("getAIMode", () => {
  it.each([
    [undefined, "prod"],
    ["test", "test"],
    ["development", "test"],
    ["DEV", "test"],
    ["production", "prod"],
  ])("AI_MODE=%s -> %s", (value, expected) => {
    expect(getAIMode({ AI_MODE: value })).toBe(expected);
  });
});

describe("getPlannerConfig", () => {
  it("uses the defaults for an empty environment", () => {
    expect(getPlannerConfig({})).toEqual(DEFAULT_PLANNER_CONFIG);
  });

  it("reads overrides from the environment", () => {
    const config = getPlannerConfig({
      OPENAI_MODEL: "gpt-test",
      LLM_LOG_DIR: "/tmp/llm",
      LLM_LOG_ENABLED: "False",
      MAX_REPLAN_ATTEMPTS: "3",
      COLLABORATOR_MAX_ATTEMPTS: "1",
      BUDGET_EXHAUSTED_POLICY: "FAIL",
      DEFAULT_PUBLIC_TRANSPORT_FARE: "3.2",
      DEFAULT_BASE_TAXI_FARE: "0",
      CURRENCY_SYMBOL: "$",
    });

    expect(config).toMatchObject({
      openaiModel: "gpt-test",
      llmLogDir: "/tmp/llm",
      llmLogEnabled: false,
      maxReplanAttempts: 3,
      collaboratorMaxAttempts: 1,
      budgetExhaustedPolicy: "fail",
      defaultPublicTransportFare: 3.2,
      defaultBaseTaxiFare: 0,
      currencySymbol: "$",
    });
  });

  it("ignores values that are out of range", () => {
    const config = getPlannerConfig({
      MAX_REPLAN_ATTEMPTS: "0",
      COLLABORATOR_MAX_ATTEMPTS: "2.5",
      DEFAULT_PUBLIC_TRANSPORT_FARE: "-1",
      DEFAULT_BASE_TAXI_FARE: "cheap",
      BUDGET_EXHAUSTED_POLICY: "panic",
    });

    expect(config.maxReplanAttempts).toBe(5);
    expect(config.collaboratorMaxAttempts).toBe(3);
    expect(config.defaultPublicTransportFare).toBe(2.5);
    expect(config.defaultBaseTaxiFare).toBe(1.5);
    expect(config.budgetExhaustedPolicy).toBe("accept-best");
  });
});
