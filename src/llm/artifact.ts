/**
 * Artifact decoding: the one place where free-form LLM output for a model is
 * turned into a GeneratedArtifact.
 */

import { z } from "zod/v4";
import type { GeneratedArtifact } from "../types/artifact.ts";
import { isRecord } from "../compiler/normalize.ts";

const StructuredSqlx = z.object({
  config: z.union([z.string(), z.record(z.string(), z.unknown())]).optional(),
  sql: z.string().optional(),
});

const StructuredTest = z.object({
  test_sql: z.string().optional(),
  sql: z.string().optional(),
  queries: z.array(z.unknown()).optional(),
});

/**
 * Decode a SQLX response value: a plain string, a string holding a JSON
 * object, or `{ config, sql }`. A `config` that is not a string is dropped so
 * that the caller's default header is used.
 */
export function decodeSqlxArtifact(value: unknown): GeneratedArtifact {
  if (typeof value === "string") {
    const embedded = parseEmbeddedObject(value);
    return embedded ? decodeSqlxArtifact(embedded) : { kind: "text", text: value };
  }

  const parsed = StructuredSqlx.safeParse(value);
  if (!parsed.success) return { kind: "text", text: stringify(value) };

  const { config, sql } = parsed.data;
  const header = typeof config === "string" && config.trim() ? config.trim() : undefined;
  return { kind: "structured", header, body: sql ?? "" };
}

/** Decode a test response value: a string, `{ test_sql }`, `{ sql }` or `{ queries }` */
export function decodeTestArtifact(value: unknown): GeneratedArtifact {
  if (typeof value === "string") return { kind: "text", text: value };

  const parsed = StructuredTest.safeParse(value);
  if (!parsed.success) return { kind: "text", text: stringify(value) };

  const { test_sql, sql, queries } = parsed.data;
  if (test_sql !== undefined) return { kind: "text", text: test_sql };
  if (sql !== undefined) return { kind: "structured", body: sql };
  if (queries) {
    const statements = queries.filter(
      (q): q is string => typeof q === "string" && q.trim().length > 0,
    );
    return { kind: "text", text: statements.join("\n;\n") };
  }
  return { kind: "text", text: stringify(value) };
}

/** Render an artifact to file text, always ending in a newline */
export function renderArtifact(
  artifact: GeneratedArtifact,
  defaultHeader = "",
): string {
  const text = artifactText(artifact, defaultHeader);
  return text.endsWith("\n") ? text : `${text}\n`;
}

function artifactText(artifact: GeneratedArtifact, defaultHeader: string): string {
  if (artifact.kind === "text") return artifact.text;
  const header = artifact.header ?? defaultHeader;
  return header ? `${header}\n${artifact.body}` : artifact.body;
}

function parseEmbeddedObject(value: string): Record<string, unknown> | undefined {
  const trimmed = value.trim();
  if (!trimmed.startsWith("{") || !trimmed.endsWith("}")) return undefined;
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    // braces in plain SQL text; treat as text
    return undefined;
  }
}

function stringify(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value) ?? String(value);
}
