/**
 * SQL builder: synthesizes a SELECT statement for one model from its column
 * mappings, joins, filters and aggregations. Never throws: incomplete rows are
 * dropped and a model without sources yields a placeholder query.
 */

import {
  NO_SCOPE,
  schemaForLayer,
  type AggregationSpec,
  type ColumnMapping,
  type ModelSpec,
} from "../types/requirements.ts";

export const PLACEHOLDER_SELECT = "SELECT 1 AS placeholder";
const FROM_PLACEHOLDER = "{from}";
const LIST_SEPARATOR = ",\n       ";

export interface BuildOptions {
  /**
   * Filter scopes that apply to this model. Defaults to the model's own name
   * and its sources.
   */
  filterScopes?: Iterable<string>;
}

/** Reference another generated or declared table by logical name */
export function ref(table: string): string {
  return `\${ref('${table}')}`;
}

export function renderConfigHeader(schema: string): string {
  return `config { type: "table", schema: "${schema}" }`;
}

/** Build the full SQLX text: config header, blank line, SELECT body */
export function buildSqlx(
  model: ModelSpec,
  stagingSchema: string,
  finalSchema: string,
  options: BuildOptions = {},
): string {
  const schema = schemaForLayer(model.layer, stagingSchema, finalSchema);
  return `${renderConfigHeader(schema)}\n\n${buildSelect(model, options)}\n`;
}

/** Build the SELECT body for a model */
export function buildSelect(model: ModelSpec, options: BuildOptions = {}): string {
  const from = model.sources[0];
  if (!from) return PLACEHOLDER_SELECT;

  const scopes = resolveScopes(model, options);

  if (model.layer === "final") {
    const metrics = model.aggregations
      .map(aggregateExpression)
      .filter((expr): expr is string => expr !== null);

    if (metrics.length > 0) {
      // Only grouped dimensions may appear beside the aggregates
      const groupKeys = new Set(model.group_by);
      const dimensions = model.column_mapping
        .filter((c) => groupKeys.has(c.target_column))
        .map(selectExpression);
      return composeSelect([...dimensions, ...metrics], from, model, scopes, model.group_by);
    }
  }

  const columns = model.column_mapping
    .filter((c) => c.target_column)
    .map(selectExpression);
  return composeSelect(columns, from, model, scopes, []);
}

/** Render one column mapping as `<expr> AS <target>` */
export function selectExpression(column: ColumnMapping): string {
  const base =
    column.from_table && column.from_column
      ? `${column.from_table}.${column.from_column}`
      : "NULL";

  let expr = base;
  if (column.transform.includes(FROM_PLACEHOLDER)) {
    expr = column.transform.split(FROM_PLACEHOLDER).join(base);
  } else if (column.transform) {
    expr = column.transform;
  }
  return `${expr} AS ${column.target_column}`;
}

function aggregateExpression(aggregation: AggregationSpec): string | null {
  if (!aggregation.metric_column || !aggregation.formula) return null;
  return `${aggregation.formula} AS ${aggregation.metric_column}`;
}

function composeSelect(
  selectList: string[],
  from: string,
  model: ModelSpec,
  scopes: Set<string>,
  groupBy: string[],
): string {
  const lines = [
    "SELECT",
    `       ${selectList.length > 0 ? selectList.join(LIST_SEPARATOR) : "*"}`,
    `FROM ${ref(from)}`,
    ...joinClauses(model),
  ];

  const predicates = wherePredicates(model, scopes);
  if (predicates.length > 0) {
    lines.push(`WHERE ${predicates.join(" AND ")}`);
  }
  if (groupBy.length > 0) {
    lines.push(`GROUP BY ${groupBy.join(", ")}`);
  }
  return lines.join("\n");
}

/** Joins need both a right table and a condition; others are dropped */
function joinClauses(model: ModelSpec): string[] {
  return model.joins
    .filter((join) => join.right_table && join.condition)
    .map((join) => {
      const type = (join.type || "LEFT").toUpperCase();
      return `${type} JOIN ${ref(join.right_table)} ON ${join.condition}`;
    });
}

function wherePredicates(model: ModelSpec, scopes: Set<string>): string[] {
  return model.filters
    .filter((filter) => {
      if (!filter.predicate) return false;
      const scope = filter.applies_to.trim().toLowerCase();
      return scope === NO_SCOPE || scopes.has(scope);
    })
    .map((filter) => filter.predicate);
}

function resolveScopes(model: ModelSpec, options: BuildOptions): Set<string> {
  const scopes = options.filterScopes ?? [model.name, ...model.sources];
  return new Set(Array.from(scopes, (s) => s.trim().toLowerCase()));
}
