/** Configuration types parsed from config/pipeline.md */

export interface LLMConfig {
  /** Provider name (e.g. "anthropic") */
  provider: string;
  /** Model used for SQLX and test generation */
  model: string;
  /** Environment variable name holding the API key */
  apiKeyEnvVar: string;
  /** Temperature for LLM calls (default 0) */
  temperature: number;
  /** Response token ceiling per call */
  maxTokens: number;
}

export interface PipelineConfig {
  llm: LLMConfig;
  /** Filter scope allow-list passed to the SQL builder */
  filterScopes?: string[];
}

/** Default LLM config when no pipeline.md is found */
export const DEFAULT_LLM_CONFIG: LLMConfig = {
  provider: "anthropic",
  model: "claude-sonnet-4-5-20250929",
  apiKeyEnvVar: "ANTHROPIC_API_KEY",
  temperature: 0,
  maxTokens: 8192,
};

/** Environment variable that overrides the configured model */
export const MODEL_ENV_VAR = "PIPESPEC_MODEL";
