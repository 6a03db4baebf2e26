/** Types for the normalized requirements document and its models */

/** Pipeline stages a model can belong to */
export const LAYERS = ["staging", "final"] as const;
export type Layer = (typeof LAYERS)[number];

/** Target schemas, keyed by role. Extra keys from the YAML block are kept. */
export interface SchemaConfig {
  raw_schema: string;
  staging_schema: string;
  final_schema: string;
  [key: string]: string;
}

export const DEFAULT_SCHEMA: Readonly<SchemaConfig> = {
  raw_schema: "raw",
  staging_schema: "temp",
  final_schema: "analytics",
};

/** Filter scope that applies regardless of the model being built */
export const NO_SCOPE = "(none)";

/** Fallback fixture for a source table without a declared mock */
export const DEFAULT_MOCK_CSV = "id,value\n1,1\n";

/** One row of a "Column mapping" table */
export interface ColumnMapping {
  target_column: string;
  /** Documentation only */
  type: string;
  from_table: string;
  from_column: string;
  /**
   * Empty for pass-through, a template containing `{from}`, or a literal
   * expression used as-is.
   */
  transform: string;
  nullable: boolean;
  tests: string[];
  description: string;
}

export interface JoinSpec {
  left_table: string;
  right_table: string;
  /** Join kind token (LEFT, INNER, ...). Empty means LEFT. */
  type: string;
  condition: string;
}

export interface FilterSpec {
  /** Scope token, or NO_SCOPE */
  applies_to: string;
  predicate: string;
  rationale: string;
}

export interface AggregationSpec {
  metric_column: string;
  type: string;
  formula: string;
  tests: string[];
  description: string;
}

/** A named SELECT rendered inside a WITH block */
export interface CteSpec {
  name: string;
  select: string;
}

/** One transformation unit; produces a single output table */
export interface ModelSpec {
  name: string;
  layer: Layer;
  /** Bare upstream table names; the first is the primary FROM target */
  sources: string[];
  column_mapping: ColumnMapping[];
  joins: JoinSpec[];
  filters: FilterSpec[];
  aggregations: AggregationSpec[];
  group_by: string[];
  constraints: Record<string, string>;
  /** YAML-declared models may carry hand-written CTEs instead of tables */
  ctes?: CteSpec[];
  final_select?: string;
}

/** An upstream table declared in the YAML block */
export interface SourceTable {
  name: string;
  schema?: string;
  description?: string;
}

/** Single-output pipeline described without model sections */
export interface FinalSpec {
  name?: string;
  select?: string;
}

/** The normalized result of parsing a requirements document */
export interface RequirementsDocument {
  schema: SchemaConfig;
  models: ModelSpec[];
  sources: SourceTable[];
  /** CSV fixture text, keyed by table name */
  mocks: Record<string, string>;
  /** Document-level filter allow-list for the SQL builder */
  filter_scopes?: string[];
  transforms?: CteSpec[];
  final?: FinalSpec;
  /** Remaining top-level configuration keys, preserved for spec.json */
  metadata: Record<string, unknown>;
}

/** Resolve the target schema for a layer. Fixed mapping; never per-model. */
export function schemaForLayer(
  layer: Layer,
  stagingSchema: string,
  finalSchema: string,
): string {
  return layer === "staging" ? stagingSchema : finalSchema;
}
