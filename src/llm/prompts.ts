/** Prompts for delegated SQLX and test generation */

import type { ModelSpec, RequirementsDocument } from "../types/requirements.ts";
import { toSpecJson } from "../generator/spec-writer.ts";

const SQLX_SYSTEM = `You are a senior data engineer generating BigQuery SQLX (Dataform) code.
Given a structured spec (models, schemas, column mappings, joins, filters, aggregations, constraints),
emit SQL for each model, using multiple CTEs where that helps.
Handle complex patterns such as SCD2 MERGE, windowed metrics, JSON extraction, array unnest, pivots and
deduplication with window functions as needed. Target the BigQuery dialect and output only code, no explanations.`;

const TEST_SYSTEM = `You are a senior data engineer generating BigQuery SQL test scripts.
Given a structured spec (models, schemas, column mappings, joins, filters, aggregations, constraints),
emit SQL that validates each transformation, including edge cases and invariants.
Create inline temp tables for fixtures. For complex logic (SCD2, windowing) assert the key invariants.`;

const SQLX_RULES = `- Use config { type: "table", schema: "<schema>" } based on layer (staging -> staging_schema, final -> final_schema).
- Reference other tables with \${ref('<table>')}.
- Use WITH CTEs for mappings, joins and filters.
- If constraints indicate SCD2, produce a MERGE pattern with effective/expiry timestamps.
- If aggregations are present, use GROUP BY or window logic.`;

/** System prompt for SQLX generation */
export function buildSqlxSystem(): string {
  return SQLX_SYSTEM;
}

/** System prompt for test generation */
export function buildTestSystem(): string {
  return TEST_SYSTEM;
}

/** Whole-document SQLX prompt: expects a JSON map of model name → SQLX */
export function buildSqlxPrompt(doc: RequirementsDocument): string {
  return `Spec JSON:
${JSON.stringify(toSpecJson(doc))}

Instructions:
- For each model, generate a complete SQLX body (config header and SQL).
${SQLX_RULES}
- Output a JSON object mapping model name -> SQLX text (string). Return ONLY JSON, no code fences.`;
}

/** Single-model SQLX prompt */
export function buildModelSqlxPrompt(
  doc: RequirementsDocument,
  model: ModelSpec,
): string {
  return `Spec/Model JSON:
${JSON.stringify({ schema: doc.schema, model })}

Instructions:
- Generate a complete SQLX body (config header and SQL) for this model only.
${SQLX_RULES}
- Output JSON: {"sqlx_text": string | {"config": string, "sql": string}}. Return ONLY JSON.`;
}

/** Whole-document test prompt: expects a JSON map of model name → test SQL */
export function buildTestPrompt(doc: RequirementsDocument): string {
  return `Spec JSON:
${JSON.stringify(toSpecJson(doc))}

Instructions:
- Generate one test script per model.
- In each script, create temp tables for the required fixtures, then the assertions.
- Focus assertions on primary keys, deduplication, SCD2 validity periods, aggregate correctness, nullability and accepted values.
- Output a JSON object mapping model name -> test SQL. Return ONLY JSON, no code fences.`;
}

/** Single-model test prompt */
export function buildModelTestPrompt(
  doc: RequirementsDocument,
  model: ModelSpec,
): string {
  return `Spec/Model JSON:
${JSON.stringify({ schema: doc.schema, mocks: doc.mocks, model })}

Instructions:
- Generate one BigQuery SQL test script for THIS model.
- Include temp tables or CTEs for fixtures, then the assertions.
- Focus on invariants relevant to the model's logic.
- Output JSON: {"test_sql": string | {"sql": string, "assertions": [string]}}. Return ONLY JSON.`;
}
