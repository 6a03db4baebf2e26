/**
 * Normalizers: coerce loosely typed values (table rows, YAML, spec.json)
 * into the document model. Missing or malformed fields degrade to empty
 * values; nothing here throws.
 */

import {
  DEFAULT_SCHEMA,
  LAYERS,
  type AggregationSpec,
  type ColumnMapping,
  type CteSpec,
  type FilterSpec,
  type FinalSpec,
  type JoinSpec,
  type Layer,
  type ModelSpec,
  type RequirementsDocument,
  type SchemaConfig,
  type SourceTable,
} from "../types/requirements.ts";

/** Keys of RequirementsDocument that are not kept in `metadata` */
const DOCUMENT_KEYS = new Set([
  "schema",
  "models",
  "sources",
  "mocks",
  "filter_scopes",
  "transforms",
  "final",
]);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Read a scalar as trimmed text; anything else becomes "" */
export function text(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return "";
}

/** Read a list of names from an array or a comma/semicolon separated string */
export function list(value: unknown): string[] {
  const items = Array.isArray(value)
    ? value.map(text)
    : text(value).split(/[,;]/);
  return items.map((s) => s.trim()).filter(Boolean);
}

/** Nullability flag: only an explicit negative makes a column non-nullable */
export function flag(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  return !/^(n|no|false|0)$/i.test(text(value));
}

export function toColumnMapping(raw: Record<string, unknown>): ColumnMapping {
  return {
    target_column: text(raw.target_column),
    type: text(raw.type),
    from_table: text(raw.from_table),
    from_column: text(raw.from_column),
    transform: text(raw.transform),
    nullable: flag(raw.nullable),
    tests: list(raw.tests),
    description: text(raw.description),
  };
}

export function toJoin(raw: Record<string, unknown>): JoinSpec {
  return {
    left_table: text(raw.left_table),
    right_table: text(raw.right_table),
    type: text(raw.type),
    condition: text(raw.condition),
  };
}

export function toFilter(raw: Record<string, unknown>): FilterSpec {
  return {
    applies_to: text(raw.applies_to),
    predicate: text(raw.predicate),
    rationale: text(raw.rationale),
  };
}

export function toAggregation(raw: Record<string, unknown>): AggregationSpec {
  return {
    metric_column: text(raw.metric_column),
    type: text(raw.type),
    formula: text(raw.formula),
    tests: list(raw.tests),
    description: text(raw.description),
  };
}

/** Flatten constraint rows into one mapping; later rows win */
export function toConstraints(
  rows: Record<string, unknown>[],
): Record<string, string> {
  const constraints: Record<string, string> = {};
  for (const row of rows) {
    for (const [key, value] of Object.entries(row)) {
      const k = key.trim();
      const v = text(value);
      if (k && v) constraints[k] = v;
    }
  }
  return constraints;
}

function toCte(raw: Record<string, unknown>): CteSpec {
  return { name: text(raw.name), select: text(raw.select) };
}

function toLayer(value: unknown): Layer {
  const layer = text(value).toLowerCase();
  return LAYERS.find((l) => l === layer) ?? "staging";
}

/** Keep only the mapping entries of an array */
function records(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/** Normalize a model declared in YAML or loaded from spec.json */
export function toModel(raw: Record<string, unknown>): ModelSpec {
  const model: ModelSpec = {
    name: text(raw.name),
    layer: toLayer(raw.layer),
    sources: list(raw.sources),
    column_mapping: records(raw.column_mapping).map(toColumnMapping),
    joins: records(raw.joins).map(toJoin),
    filters: records(raw.filters).map(toFilter),
    aggregations: records(raw.aggregations).map(toAggregation),
    group_by: list(raw.group_by),
    constraints: isRecord(raw.constraints)
      ? toConstraints([raw.constraints])
      : toConstraints(records(raw.constraints)),
  };

  const ctes = records(raw.ctes).map(toCte).filter((c) => c.name);
  if (ctes.length > 0) model.ctes = ctes;

  const finalSelect = text(raw.final_select);
  if (finalSelect) model.final_select = finalSelect;

  return model;
}

function toSource(value: unknown): SourceTable | null {
  if (typeof value === "string") {
    return value.trim() ? { name: value.trim() } : null;
  }
  if (!isRecord(value)) return null;

  const name = text(value.name);
  if (!name) return null;

  const source: SourceTable = { name };
  const schema = text(value.schema);
  if (schema) source.schema = schema;
  const description = text(value.description);
  if (description) source.description = description;
  return source;
}

/** Fill in schema defaults without overwriting keys that are present */
export function toSchemaConfig(value: unknown): SchemaConfig {
  const schema: SchemaConfig = { ...DEFAULT_SCHEMA };
  if (!isRecord(value)) return schema;

  // A present scalar wins, even when empty
  for (const [key, raw] of Object.entries(value)) {
    if (typeof raw === "string" || typeof raw === "number" || typeof raw === "boolean") {
      schema[key] = text(raw);
    }
  }
  return schema;
}

function toMocks(value: unknown): Record<string, string> {
  const mocks: Record<string, string> = {};
  if (!isRecord(value)) return mocks;

  for (const [table, csv] of Object.entries(value)) {
    if (typeof csv === "string") mocks[table] = csv;
  }
  return mocks;
}

/**
 * Build a RequirementsDocument from a parsed configuration mapping.
 * Used for the YAML block and for spec.json alike.
 */
export function toDocument(raw: Record<string, unknown>): RequirementsDocument {
  const metadata: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!DOCUMENT_KEYS.has(key)) metadata[key] = value;
  }

  const doc: RequirementsDocument = {
    schema: toSchemaConfig(raw.schema),
    models: records(raw.models).map(toModel).filter((m) => m.name),
    sources: Array.isArray(raw.sources)
      ? raw.sources
          .map(toSource)
          .filter((s): s is SourceTable => s !== null)
      : [],
    mocks: toMocks(raw.mocks),
    metadata,
  };

  if (raw.filter_scopes !== undefined) {
    doc.filter_scopes = list(raw.filter_scopes);
  }

  const transforms = records(raw.transforms).map(toCte).filter((t) => t.name);
  if (transforms.length > 0) doc.transforms = transforms;

  if (isRecord(raw.final)) {
    const final: FinalSpec = {};
    const name = text(raw.final.name);
    if (name) final.name = name;
    const select = text(raw.final.select);
    if (select) final.select = select;
    doc.final = final;
  }

  return doc;
}
