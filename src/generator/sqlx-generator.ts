import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import {
  schemaForLayer,
  type CteSpec,
  type ModelSpec,
  type RequirementsDocument,
} from "../types/requirements.ts";
import {
  PLACEHOLDER_SELECT,
  buildSqlx,
  renderConfigHeader,
} from "../compiler/sql-builder.ts";

export const DEFAULT_FINAL_NAME = "final_output";

export interface SqlxOptions {
  /** Overrides the document's filter_scopes */
  filterScopes?: string[];
}

/** Render SQLX text for every output of the document, keyed by name */
export function generateSqlx(
  doc: RequirementsDocument,
  options: SqlxOptions = {},
): Map<string, string> {
  const { staging_schema: staging, final_schema: final } = doc.schema;
  const filterScopes = options.filterScopes ?? doc.filter_scopes;
  const outputs = new Map<string, string>();

  for (const model of doc.models) {
    outputs.set(model.name, renderModel(model, staging, final, filterScopes));
  }

  if (doc.models.length === 0 && doc.transforms) {
    const name = doc.final?.name ?? DEFAULT_FINAL_NAME;
    outputs.set(
      name,
      renderCteQuery(final, doc.transforms, doc.final?.select),
    );
  }

  return outputs;
}

/** Write `<name>.sqlx` for each output and return the written paths */
export async function writeSqlxFiles(
  doc: RequirementsDocument,
  outDir: string,
  options: SqlxOptions = {},
): Promise<string[]> {
  await mkdir(outDir, { recursive: true });

  const written: string[] = [];
  for (const [name, sqlx] of generateSqlx(doc, options)) {
    const path = join(outDir, `${name}.sqlx`);
    await writeFile(path, sqlx, "utf-8");
    written.push(path);
  }
  return written;
}

function renderModel(
  model: ModelSpec,
  stagingSchema: string,
  finalSchema: string,
  filterScopes: string[] | undefined,
): string {
  // Table-driven models go through the builder; others carry their own SQL
  if (model.column_mapping.length > 0 || model.aggregations.length > 0) {
    return buildSqlx(model, stagingSchema, finalSchema, { filterScopes });
  }

  const schema = schemaForLayer(model.layer, stagingSchema, finalSchema);
  return renderCteQuery(schema, model.ctes ?? [], model.final_select);
}

/** Config header, optional WITH block, then the final select */
export function renderCteQuery(
  schema: string,
  ctes: CteSpec[],
  finalSelect: string | undefined,
): string {
  const parts = [renderConfigHeader(schema), ""];

  if (ctes.length > 0) {
    const blocks = ctes.map((cte) => `${cte.name} AS (\n${cte.select.trim()}\n)`);
    parts.push(`WITH\n${blocks.join(",\n\n")}`);
  }

  parts.push(finalSelect?.trim() || PLACEHOLDER_SELECT);
  return `${parts.join("\n")}\n`;
}
