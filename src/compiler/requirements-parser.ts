/**
 * Requirements parser: the entry point that turns a requirements Markdown
 * document into a RequirementsDocument. Rule-based; no LLM involved.
 */

import { parse as parseYaml } from "yaml";
import type { RequirementsDocument } from "../types/requirements.ts";
import { parseModels } from "./model-parser.ts";
import { isRecord, toDocument } from "./normalize.ts";

const FENCED_YAML = /```ya?ml\s*([\s\S]*?)\s*```/i;
/** Front-matter only counts at the very start of the document */
const FRONT_MATTER = /^---[ \t]*\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)/;

/** Parse a requirements document */
export function parseRequirements(markdown: string): RequirementsDocument {
  const config = extractConfig(markdown);
  const doc = toDocument(config);

  const models = parseModels(markdown, {
    stagingSchema: doc.schema.staging_schema,
  });
  // Table-driven models replace YAML-declared ones outright
  if (models.length > 0) {
    doc.models = models;
  }

  return doc;
}

/**
 * Locate and parse the YAML configuration block. A fenced yaml block wins
 * over front-matter; with neither, configuration is empty.
 */
export function extractConfig(markdown: string): Record<string, unknown> {
  const match = markdown.match(FENCED_YAML) ?? markdown.match(FRONT_MATTER);
  if (!match) return {};

  const source = match[1] ?? "";
  let parsed: unknown;
  try {
    parsed = parseYaml(source);
  } catch (err) {
    throw new ConfigSyntaxError(
      err instanceof Error ? err.message : String(err),
      source,
      err,
    );
  }

  return isRecord(parsed) ? parsed : {};
}

export class ConfigSyntaxError extends Error {
  /** The YAML text that failed to parse */
  readonly source: string;

  constructor(message: string, source: string, cause?: unknown) {
    super(`Invalid YAML configuration: ${message}`, { cause });
    this.name = "ConfigSyntaxError";
    this.source = source;
  }
}
