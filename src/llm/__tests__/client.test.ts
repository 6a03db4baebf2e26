import { afterEach, describe, expect, test } from "vitest";
import { DEFAULT_LLM_CONFIG } from "../../types/config.ts";
import { LLMClient, extractJSON } from "../client.ts";

describe("extractJSON", () => {
  test("parses a bare JSON response", () => {
    expect(extractJSON('  {"a": 1}  ')).toEqual({ a: 1 });
  });

  test("parses JSON inside a fenced code block", () => {
    expect(extractJSON('Here you go:\n```json\n{"models": {}}\n```\nDone.')).toEqual({ models: {} });
  });

  test("falls back to the outermost braces", () => {
    expect(extractJSON('Result: {"sql": "SELECT 1"} as requested')).toEqual({ sql: "SELECT 1" });
  });

  test("returns undefined when nothing parses", () => {
    expect(extractJSON("no json here")).toBeUndefined();
  });
});

describe("LLMClient", () => {
  const envVar = "PIPESPEC_TEST_API_KEY";

  afterEach(() => {
    delete process.env[envVar];
  });

  test("is configured only when the key variable is set", () => {
    const client = new LLMClient({ ...DEFAULT_LLM_CONFIG, apiKeyEnvVar: envVar });
    expect(client.isConfigured()).toBe(false);
    process.env[envVar] = "test-secret";
    expect(client.isConfigured()).toBe(true);
  });

  test("rejects unsupported providers", async () => {
    const client = new LLMClient({ ...DEFAULT_LLM_CONFIG, provider: "other" });
    await expect(client.generate({ system: "s", prompt: "p" })).rejects.toThrow(
      "Unsupported LLM provider: other",
    );
  });

  test("rejects when the API key is missing", async () => {
    const client = new LLMClient({ ...DEFAULT_LLM_CONFIG, apiKeyEnvVar: envVar });
    await expect(client.generate({ system: "s", prompt: "p" })).rejects.toThrow(
      `Missing API key: environment variable ${envVar} is not set`,
    );
  });
});
