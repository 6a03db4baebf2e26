/** spec.json and per-model mapping documents */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ModelSpec, RequirementsDocument } from "../types/requirements.ts";

export interface SpecArtifacts {
  specJson: string;
  mappingDocs: string[];
}

/** Plain JSON shape of a document; metadata keys come first */
export function toSpecJson(doc: RequirementsDocument): Record<string, unknown> {
  const json: Record<string, unknown> = {
    ...doc.metadata,
    schema: doc.schema,
    models: doc.models,
    sources: doc.sources,
    mocks: doc.mocks,
  };
  if (doc.filter_scopes) json.filter_scopes = doc.filter_scopes;
  if (doc.transforms) json.transforms = doc.transforms;
  if (doc.final) json.final = doc.final;
  return json;
}

/** Write spec.json and mappings/<model>.md under outRoot */
export async function writeSpecArtifacts(
  doc: RequirementsDocument,
  outRoot: string,
): Promise<SpecArtifacts> {
  await mkdir(outRoot, { recursive: true });

  const specJson = join(outRoot, "spec.json");
  await writeFile(specJson, JSON.stringify(toSpecJson(doc), null, 2), "utf-8");

  const mappingsDir = join(outRoot, "mappings");
  await mkdir(mappingsDir, { recursive: true });

  const mappingDocs: string[] = [];
  for (const model of doc.models) {
    const path = join(mappingsDir, `${model.name}.md`);
    await writeFile(path, renderModelDoc(model), "utf-8");
    mappingDocs.push(path);
  }

  return { specJson, mappingDocs };
}

/** Render the mapping document for one model */
export function renderModelDoc(model: ModelSpec): string {
  const sections: string[] = [`# Model: ${model.name} (layer: ${model.layer})\n`];

  if (model.sources.length > 0) {
    sections.push(`Sources: ${model.sources.join(", ")}\n`);
  }

  if (model.column_mapping.length > 0) {
    sections.push(
      section(
        "Column mapping",
        ["target_column", "type", "from_table", "from_column", "transform", "nullable", "tests", "description"],
        model.column_mapping.map((c) => [
          c.target_column,
          c.type,
          c.from_table,
          c.from_column,
          c.transform,
          String(c.nullable),
          c.tests.join(","),
          c.description,
        ]),
      ),
    );
  }

  if (model.joins.length > 0) {
    sections.push(
      section(
        "Joins",
        ["left_table", "right_table", "type", "condition"],
        model.joins.map((j) => [j.left_table, j.right_table, j.type, j.condition]),
      ),
    );
  }

  if (model.filters.length > 0) {
    sections.push(
      section(
        "Filters",
        ["applies_to", "predicate", "rationale"],
        model.filters.map((f) => [f.applies_to, f.predicate, f.rationale]),
      ),
    );
  }

  if (model.aggregations.length > 0) {
    sections.push(
      section(
        "Aggregations",
        ["metric_column", "type", "formula", "tests", "description"],
        model.aggregations.map((a) => [
          a.metric_column,
          a.type,
          a.formula,
          a.tests.join(","),
          a.description,
        ]),
      ),
    );
  }

  if (model.group_by.length > 0) {
    sections.push(section("Group by", ["group_key"], model.group_by.map((k) => [k])));
  }

  const constraintKeys = Object.keys(model.constraints);
  if (constraintKeys.length > 0) {
    sections.push(
      section("Output constraints", constraintKeys, [Object.values(model.constraints)]),
    );
  }

  return sections.join("\n");
}

function section(title: string, headers: string[], rows: string[][]): string {
  return `## ${title}\n\n${markdownTable(headers, rows)}\n`;
}

export function markdownTable(headers: string[], rows: string[][]): string {
  const headerRow = `| ${headers.join(" | ")} |`;
  const separator = `|${headers.map((h) => "-".repeat(h.length + 2)).join("|")}|`;
  const dataRows = rows.map((row) => `| ${row.join(" | ")} |`);
  return [headerRow, separator, ...dataRows].join("\n");
}
