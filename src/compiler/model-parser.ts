/**
 * Model block parser: finds the "### Model: <name> (schema: <schema>)"
 * sections of a requirements document and reads the typed tables under each.
 */

import { DEFAULT_SCHEMA, type Layer, type ModelSpec } from "../types/requirements.ts";
import { parseTable, type TableRow } from "./table-parser.ts";
import {
  toAggregation,
  toColumnMapping,
  toConstraints,
  toFilter,
  toJoin,
} from "./normalize.ts";

const MODEL_HEADER_PATTERN =
  /^###\s+Model:\s*`?([^\s`]+)`?\s*\(schema:\s*`?([^)`]+?)`?\s*\)\s*$/gm;
const SOURCES_PATTERN = /Sources:[ \t]*(.*)/;

export interface ParseModelsOptions {
  /** Schema token that marks a model as staging. Defaults to "temp". */
  stagingSchema?: string;
}

interface ModelHeader {
  name: string;
  schema: string;
  /** Offset of the header line */
  start: number;
}

/** Parse every model section of a document, in document order */
export function parseModels(
  text: string,
  options: ParseModelsOptions = {},
): ModelSpec[] {
  const stagingSchema = options.stagingSchema ?? DEFAULT_SCHEMA.staging_schema;
  const headers = findHeaders(text);
  const models: ModelSpec[] = [];
  const seen = new Set<string>();

  headers.forEach((header, i) => {
    if (!header.name || seen.has(header.name)) return;
    seen.add(header.name);

    const end = headers[i + 1]?.start ?? text.length;
    const block = text.slice(header.start, end);
    models.push(parseModelBlock(block, header, stagingSchema));
  });

  return models;
}

function findHeaders(text: string): ModelHeader[] {
  return Array.from(text.matchAll(MODEL_HEADER_PATTERN), (match) => ({
    name: (match[1] ?? "").trim(),
    schema: (match[2] ?? "").trim(),
    start: match.index ?? 0,
  }));
}

function parseModelBlock(
  block: string,
  header: ModelHeader,
  stagingSchema: string,
): ModelSpec {
  return {
    name: header.name,
    layer: layerForSchema(header.schema, stagingSchema),
    sources: extractSources(block),
    column_mapping: sectionTable(block, "Column mapping").map(toColumnMapping),
    joins: sectionTable(block, "Joins").map(toJoin),
    filters: sectionTable(block, "Filters").map(toFilter),
    aggregations: sectionTable(block, "Aggregations").map(toAggregation),
    group_by: sectionTable(block, "Group by")
      .map((row) => (row.group_key ?? "").trim())
      .filter(Boolean),
    constraints: toConstraints(sectionTable(block, "Output constraints")),
  };
}

/**
 * Layer is inferred from the declared schema: the staging schema token means
 * staging, anything else is final. This is a naming convention only.
 */
export function layerForSchema(schema: string, stagingSchema: string): Layer {
  return schema === stagingSchema ? "staging" : "final";
}

/** Read the "Sources:" line and keep the bare table name of each entry */
function extractSources(block: string): string[] {
  const match = block.match(SOURCES_PATTERN);
  if (!match?.[1]) return [];

  // Prefer the backtick-quoted names when the line has any
  const quoted = Array.from(match[1].matchAll(/`([^`]+)`/g), (m) => m[1] ?? "");
  const names = quoted.length > 0 ? quoted.join(",") : match[1].replace(/\*/g, "");

  return names
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map((s) => s.split(".").pop() ?? s)
    .filter(Boolean);
}

/** Find the fenced table that follows a section title and parse it */
function sectionTable(block: string, title: string): TableRow[] {
  const pattern = new RegExp(
    `${escapeRegExp(title)}:?[ \\t]*\\r?\\n\\s*\`\`\`[\\w-]*[ \\t]*\\r?\\n([\\s\\S]*?)\\r?\\n[ \\t]*\`\`\``,
    "i",
  );
  const match = block.match(pattern);
  if (!match?.[1]) return [];
  return parseTable(match[1]);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
