/**
 * pipespec: requirements documents to normalized specs, SQLX models and
 * SQL tests.
 */

export * from "./types/requirements.ts";
export type { GeneratedArtifact } from "./types/artifact.ts";
export type { LLMConfig, PipelineConfig } from "./types/config.ts";
export { parseTable, type TableRow } from "./compiler/table-parser.ts";
export { parseModels, layerForSchema, type ParseModelsOptions } from "./compiler/model-parser.ts";
export {
  parseRequirements,
  extractConfig,
  ConfigSyntaxError,
} from "./compiler/requirements-parser.ts";
export {
  buildSelect,
  buildSqlx,
  selectExpression,
  ref,
  renderConfigHeader,
  PLACEHOLDER_SELECT,
  type BuildOptions,
} from "./compiler/sql-builder.ts";
export { generateSqlx, writeSqlxFiles, renderCteQuery, type SqlxOptions } from "./generator/sqlx-generator.ts";
export { toSpecJson, renderModelDoc, writeSpecArtifacts, type SpecArtifacts } from "./generator/spec-writer.ts";
export {
  generateTestSql,
  writeTestFiles,
  renderFixture,
  collectAssertions,
} from "./generator/test-generator.ts";
export {
  generateSqlxWithLLM,
  generateTestsWithLLM,
  GenerationError,
} from "./generator/llm-generator.ts";
export { decodeSqlxArtifact, decodeTestArtifact, renderArtifact } from "./llm/artifact.ts";
export { LLMClient, type TextGenerator, type LLMRequest, type LLMResponse } from "./llm/client.ts";
export { loadPipelineConfig, parsePipelineConfig } from "./config/loader.ts";
export { loadRequirementsFile, loadSpecFile, parseSpecJson, SpecLoadError } from "./project/loader.ts";
export { createServer } from "./server/stdio-server.ts";
