/**
 * LLM client: abstraction layer for calling language models.
 * Currently supports Anthropic.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { LLMConfig } from "../types/config.ts";

export interface LLMRequest {
  /** System prompt */
  system: string;
  /** User message */
  prompt: string;
  /** Expected JSON output: parse the response text as JSON */
  jsonMode?: boolean;
  /** Max tokens for response */
  maxTokens?: number;
}

export interface LLMResponse {
  /** Raw text response from the model */
  text: string;
  /** Parsed JSON if jsonMode was true and response was valid JSON */
  json?: unknown;
  usage: {
    inputTokens: number;
    outputTokens: number;
  };
}

/** Anything that can answer a generation request */
export interface TextGenerator {
  generate(request: LLMRequest): Promise<LLMResponse>;
}

export class LLMClient implements TextGenerator {
  private config: LLMConfig;
  private anthropic: Anthropic | null = null;

  constructor(config: LLMConfig) {
    this.config = config;
  }

  get model(): string {
    return this.config.model;
  }

  /** Check if the LLM client is configured and ready */
  isConfigured(): boolean {
    const apiKey = process.env[this.config.apiKeyEnvVar];
    return !!apiKey && apiKey.length > 0;
  }

  async generate(request: LLMRequest): Promise<LLMResponse> {
    if (this.config.provider !== "anthropic") {
      throw new Error(`Unsupported LLM provider: ${this.config.provider}`);
    }

    const client = this.getAnthropicClient();
    const response = await client.messages.create({
      model: this.config.model,
      max_tokens: request.maxTokens ?? this.config.maxTokens,
      temperature: this.config.temperature,
      system: request.system,
      messages: [{ role: "user", content: request.prompt }],
    });

    const text = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === "text")
      .map((block) => block.text)
      .join("");

    return {
      text,
      json: request.jsonMode ? extractJSON(text) : undefined,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }

  private getAnthropicClient(): Anthropic {
    if (!this.anthropic) {
      const apiKey = process.env[this.config.apiKeyEnvVar];
      if (!apiKey) {
        throw new Error(
          `Missing API key: environment variable ${this.config.apiKeyEnvVar} is not set`,
        );
      }
      this.anthropic = new Anthropic({ apiKey });
    }
    return this.anthropic;
  }
}

/**
 * Extract JSON from LLM text response.
 * Handles cases where the JSON is wrapped in markdown code blocks.
 */
export function extractJSON(text: string): unknown {
  const candidates = [
    text.trim(),
    text.match(/```(?:json)?\s*\n([\s\S]*?)\n```/)?.[1],
    text.match(/(\{[\s\S]*\}|\[[\s\S]*\])/)?.[1],
  ];

  for (const candidate of candidates) {
    if (!candidate) continue;
    const parsed = tryParse(candidate.trim());
    if (parsed !== undefined) return parsed;
  }
  return undefined;
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // not JSON; caller tries the next candidate
    return undefined;
  }
}
