/**
 * One SQL test script per model. Each script creates inline fixture tables
 * from the document's CSV mocks, then runs ASSERT statements derived from
 * column tests, nullability and output constraints.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import {
  DEFAULT_MOCK_CSV,
  schemaForLayer,
  type ModelSpec,
  type RequirementsDocument,
} from "../types/requirements.ts";

/** Test kinds that translate into an assertion */
export const ASSERTION_KINDS = ["not_null", "unique", "non_negative"] as const;
export type AssertionKind = (typeof ASSERTION_KINDS)[number];

export interface Assertion {
  kind: AssertionKind;
  column: string;
}

export interface CollectedAssertions {
  assertions: Assertion[];
  /** Test names with no assertion template, as `column: test` */
  unsupported: string[];
}

/** Generate the test script for a single model */
export function generateTestSql(
  doc: RequirementsDocument,
  model: ModelSpec,
  source: string,
): string {
  const schema = schemaForLayer(
    model.layer,
    doc.schema.staging_schema,
    doc.schema.final_schema,
  );
  const target = `${schema}.${model.name}`;

  const parts = [
    "-- Auto-generated tests from requirements",
    `-- Requirements source: ${source}`,
    `-- Model under test: ${target}`,
    "",
  ];

  for (const table of fixtureTables(doc, model)) {
    parts.push(renderFixture(table, doc.mocks[table] ?? DEFAULT_MOCK_CSV), "");
  }

  const { assertions, unsupported } = collectAssertions(model);
  for (const test of unsupported) {
    parts.push(`-- Unsupported test skipped: ${test}`);
  }
  if (unsupported.length > 0) parts.push("");

  if (assertions.length === 0) {
    parts.push("SELECT 1 AS test_assertion;");
  } else {
    parts.push(assertions.map((a) => renderAssertion(a, target)).join("\n\n"));
  }

  return `${parts.join("\n")}\n`;
}

/** Write `test_req_<model>.sql` for each model; returns the written paths */
export async function writeTestFiles(
  doc: RequirementsDocument,
  outDir: string,
  source: string,
): Promise<string[]> {
  await mkdir(outDir, { recursive: true });

  const written: string[] = [];
  for (const model of doc.models) {
    const path = join(outDir, `test_req_${model.name}.sql`);
    await writeFile(path, generateTestSql(doc, model, source), "utf-8");
    written.push(path);
  }
  return written;
}

/** The model's own sources, or the document's declared ones */
function fixtureTables(doc: RequirementsDocument, model: ModelSpec): string[] {
  if (model.sources.length > 0) return model.sources;
  return doc.sources.map((s) => s.name.split(".").pop() ?? s.name);
}

/** Render CSV fixture text as a temp table of UNION ALL rows */
export function renderFixture(table: string, csv: string): string {
  const lines = csv
    .trim()
    .split(/\r?\n/)
    .filter((line) => line.trim());
  const headers = (lines[0] ?? "").split(",").map((h) => h.trim());

  const rows = lines.slice(1).map((line) => {
    const values = line.split(",").map((v) => quote(v.trim()));
    const cells = headers.map((h, i) => `${values[i] ?? "NULL"} AS ${h}`);
    return `  SELECT ${cells.join(", ")}`;
  });

  const body = rows.length > 0 ? rows.join(" UNION ALL\n") : "  SELECT NULL AS placeholder";
  return `CREATE OR REPLACE TEMP TABLE ${table} AS (\n${body}\n);`;
}

function quote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/** Derive deduplicated assertions from a model's declared tests */
export function collectAssertions(model: ModelSpec): CollectedAssertions {
  const assertions: Assertion[] = [];
  const unsupported: string[] = [];
  const seen = new Set<string>();

  const add = (kind: AssertionKind, column: string) => {
    const key = `${kind}:${column}`;
    if (seen.has(key)) return;
    seen.add(key);
    assertions.push({ kind, column });
  };

  const addTests = (column: string, tests: string[]) => {
    for (const test of tests) {
      const kind = ASSERTION_KINDS.find((k) => k === test.toLowerCase());
      if (kind) add(kind, column);
      else unsupported.push(`${column}: ${test}`);
    }
  };

  for (const column of model.column_mapping) {
    if (!column.target_column) continue;
    if (!column.nullable) add("not_null", column.target_column);
    addTests(column.target_column, column.tests);
  }

  for (const aggregation of model.aggregations) {
    if (!aggregation.metric_column) continue;
    addTests(aggregation.metric_column, aggregation.tests);
  }

  const primaryKey = model.constraints.primary_key ?? "";
  for (const column of primaryKey.split(",").map((c) => c.trim()).filter(Boolean)) {
    add("not_null", column);
    add("unique", column);
  }

  return { assertions, unsupported };
}

function renderAssertion(assertion: Assertion, target: string): string {
  const { kind, column } = assertion;
  switch (kind) {
    case "not_null":
      return [
        "ASSERT (",
        `  SELECT COUNT(*) FROM ${target} WHERE ${column} IS NULL`,
        `) = 0 AS '${column} should not be null';`,
      ].join("\n");
    case "unique":
      return [
        "ASSERT (",
        `  SELECT COUNT(DISTINCT ${column}) FROM ${target}`,
        `) = (SELECT COUNT(*) FROM ${target}) AS '${column} should be unique';`,
      ].join("\n");
    case "non_negative":
      return [
        "ASSERT (",
        `  SELECT COUNT(*) FROM ${target} WHERE ${column} < 0`,
        `) = 0 AS '${column} should not be negative';`,
      ].join("\n");
  }
}
