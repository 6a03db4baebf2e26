import { readFile } from "node:fs/promises";
import { join } from "node:path";
import type { LLMConfig, PipelineConfig } from "../types/config.ts";
import { DEFAULT_LLM_CONFIG } from "../types/config.ts";

/** Load pipeline configuration from config/pipeline.md under rootPath */
export async function loadPipelineConfig(
  rootPath: string,
): Promise<PipelineConfig> {
  let content: string;
  try {
    content = await readFile(join(rootPath, "config", "pipeline.md"), "utf-8");
  } catch {
    return { llm: { ...DEFAULT_LLM_CONFIG } };
  }
  return parsePipelineConfig(content);
}

/** Extract settings from markdown content */
export function parsePipelineConfig(content: string): PipelineConfig {
  const config: PipelineConfig = { llm: parseLLMConfig(content) };

  const scopesMatch = content.match(/\*\*Filter scopes:\*\*\s*(.+)/i);
  if (scopesMatch?.[1]) {
    const scopes = scopesMatch[1]
      .replace(/`/g, "")
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean);
    if (scopes.length > 0) config.filterScopes = scopes;
  }

  return config;
}

function parseLLMConfig(content: string): LLMConfig {
  const config = { ...DEFAULT_LLM_CONFIG };

  const providerMatch = content.match(/\*\*Provider:\*\*\s*(.+)/i);
  if (providerMatch?.[1]) {
    config.provider = providerMatch[1].trim().toLowerCase();
  }

  const modelMatch = content.match(/\*\*Model:\*\*\s*(.+)/i);
  if (modelMatch?.[1]) {
    config.model = modelMatch[1].replace(/`/g, "").trim();
  }

  const apiKeyMatch = content.match(
    /\*\*API key:\*\*\s*(?:Environment variable\s+)?`?(\w+)`?/i,
  );
  if (apiKeyMatch?.[1]) {
    config.apiKeyEnvVar = apiKeyMatch[1].trim();
  }

  const tempMatch = content.match(/\*\*Temperature:\*\*\s*(\d+(?:\.\d+)?)/i);
  if (tempMatch?.[1]) {
    config.temperature = parseFloat(tempMatch[1]);
  }

  const maxTokensMatch = content.match(/\*\*Max tokens:\*\*\s*(\d+)/i);
  if (maxTokensMatch?.[1]) {
    config.maxTokens = parseInt(maxTokensMatch[1], 10);
  }

  return config;
}
