/**
 * LLM generators: delegate SQLX or test generation to a language model.
 *
 * One call covers the whole document; entries keyed by known model names are
 * written. When that call yields nothing usable, each model is generated with
 * its own call.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import {
  schemaForLayer,
  type ModelSpec,
  type RequirementsDocument,
} from "../types/requirements.ts";
import type { GeneratedArtifact } from "../types/artifact.ts";
import type { TextGenerator } from "../llm/client.ts";
import {
  buildModelSqlxPrompt,
  buildModelTestPrompt,
  buildSqlxPrompt,
  buildSqlxSystem,
  buildTestPrompt,
  buildTestSystem,
} from "../llm/prompts.ts";
import {
  decodeSqlxArtifact,
  decodeTestArtifact,
  renderArtifact,
} from "../llm/artifact.ts";
import { isRecord } from "../compiler/normalize.ts";
import { renderConfigHeader } from "../compiler/sql-builder.ts";

interface GenerationPlan {
  label: string;
  system: string;
  documentPrompt: (doc: RequirementsDocument) => string;
  modelPrompt: (doc: RequirementsDocument, model: ModelSpec) => string;
  /** Key holding the artifact in a single-model response */
  modelKey: string;
  decode: (value: unknown) => GeneratedArtifact;
  fileName: (model: ModelSpec) => string;
  defaultHeader: (doc: RequirementsDocument, model: ModelSpec) => string;
}

const SQLX_PLAN: GenerationPlan = {
  label: "SQLX",
  system: buildSqlxSystem(),
  documentPrompt: buildSqlxPrompt,
  modelPrompt: buildModelSqlxPrompt,
  modelKey: "sqlx_text",
  decode: decodeSqlxArtifact,
  fileName: (model) => `${model.name}.sqlx`,
  defaultHeader: (doc, model) =>
    renderConfigHeader(
      schemaForLayer(model.layer, doc.schema.staging_schema, doc.schema.final_schema),
    ),
};

const TEST_PLAN: GenerationPlan = {
  label: "test",
  system: buildTestSystem(),
  documentPrompt: buildTestPrompt,
  modelPrompt: buildModelTestPrompt,
  modelKey: "test_sql",
  decode: decodeTestArtifact,
  fileName: (model) => `test_${model.name}.sql`,
  defaultHeader: () => "",
};

/** Generate `<model>.sqlx` files with the LLM */
export function generateSqlxWithLLM(
  doc: RequirementsDocument,
  outDir: string,
  llm: TextGenerator,
): Promise<string[]> {
  return generateWithLLM(SQLX_PLAN, doc, outDir, llm);
}

/** Generate `test_<model>.sql` files with the LLM */
export function generateTestsWithLLM(
  doc: RequirementsDocument,
  outDir: string,
  llm: TextGenerator,
): Promise<string[]> {
  return generateWithLLM(TEST_PLAN, doc, outDir, llm);
}

async function generateWithLLM(
  plan: GenerationPlan,
  doc: RequirementsDocument,
  outDir: string,
  llm: TextGenerator,
): Promise<string[]> {
  await mkdir(outDir, { recursive: true });

  const fromDocument = await generateForDocument(plan, doc, llm);
  const written: string[] = [];

  if (fromDocument.size > 0) {
    for (const model of doc.models) {
      const artifact = fromDocument.get(model.name);
      if (artifact) written.push(await write(plan, doc, model, artifact, outDir));
    }
    return written;
  }

  for (const model of doc.models) {
    const artifact = await generateForModel(plan, doc, model, llm);
    written.push(await write(plan, doc, model, artifact, outDir));
  }
  return written;
}

/** Whole-document call; failures are logged and yield an empty map */
async function generateForDocument(
  plan: GenerationPlan,
  doc: RequirementsDocument,
  llm: TextGenerator,
): Promise<Map<string, GeneratedArtifact>> {
  const artifacts = new Map<string, GeneratedArtifact>();

  let json: unknown;
  try {
    const response = await llm.generate({
      system: plan.system,
      prompt: plan.documentPrompt(doc),
      jsonMode: true,
    });
    json = response.json;
  } catch (err) {
    console.error(
      `[pipespec] Whole-document ${plan.label} generation failed, falling back to per-model calls:`,
      err instanceof Error ? err.message : err,
    );
    return artifacts;
  }

  if (!isRecord(json)) return artifacts;
  const candidate = isRecord(json.models) ? json.models : json;

  for (const model of doc.models) {
    const value = candidate[model.name];
    if (value !== undefined && value !== null) {
      artifacts.set(model.name, plan.decode(value));
    }
  }
  return artifacts;
}

async function generateForModel(
  plan: GenerationPlan,
  doc: RequirementsDocument,
  model: ModelSpec,
  llm: TextGenerator,
): Promise<GeneratedArtifact> {
  const response = await llm.generate({
    system: plan.system,
    prompt: plan.modelPrompt(doc, model),
    jsonMode: true,
  });

  if (!isRecord(response.json)) {
    throw new GenerationError(model.name, "LLM did not return a JSON object", response.text);
  }
  const value = response.json[plan.modelKey] ?? response.json;
  return plan.decode(value);
}

async function write(
  plan: GenerationPlan,
  doc: RequirementsDocument,
  model: ModelSpec,
  artifact: GeneratedArtifact,
  outDir: string,
): Promise<string> {
  const path = join(outDir, plan.fileName(model));
  await writeFile(path, renderArtifact(artifact, plan.defaultHeader(doc, model)), "utf-8");
  return path;
}

export class GenerationError extends Error {
  readonly modelName: string;
  readonly rawResponse: string;

  constructor(modelName: string, message: string, rawResponse: string) {
    super(`Generation failed for ${modelName}: ${message}`);
    this.name = "GenerationError";
    this.modelName = modelName;
    this.rawResponse = rawResponse;
  }
}
