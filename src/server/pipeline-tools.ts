/**
 * Pipeline tools: MCP tools that run the deterministic pipeline on a
 * requirements document passed in as text. Nothing is written to disk.
 */

import { z } from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { PipelineConfig } from "../types/config.ts";
import type { RequirementsDocument } from "../types/requirements.ts";
import { parseRequirements } from "../compiler/requirements-parser.ts";
import { buildSqlx } from "../compiler/sql-builder.ts";
import { generateSqlx } from "../generator/sqlx-generator.ts";
import { generateTestSql } from "../generator/test-generator.ts";
import { renderModelDoc, toSpecJson } from "../generator/spec-writer.ts";

const requirementsArg = z
  .string()
  .describe("Full requirements Markdown: YAML block plus '### Model:' sections");

/** Register all pipeline tools on the MCP server */
export function registerPipelineTools(
  server: McpServer,
  config: PipelineConfig,
): void {
  registerParseRequirements(server);
  registerGenerateSqlx(server, config);
  registerGenerateTests(server);
  registerDescribeModel(server, config);
}

/** parse_requirements: the normalized spec.json for a document */
function registerParseRequirements(server: McpServer): void {
  server.registerTool("parse_requirements", {
    title: "Parse Requirements",
    description:
      "Parses a requirements document and returns the normalized spec (schemas, models, sources, mocks).",
    inputSchema: z.object({ requirements: requirementsArg }),
  }, async ({ requirements }: { requirements: string }): Promise<CallToolResult> =>
    withDocument(requirements, (doc) => ok(toSpecJson(doc))),
  );
}

/** generate_sqlx: one SQLX text per model */
function registerGenerateSqlx(server: McpServer, config: PipelineConfig): void {
  server.registerTool("generate_sqlx", {
    title: "Generate SQLX",
    description:
      "Generates a Dataform SQLX file body for every model of a requirements document.",
    inputSchema: z.object({
      requirements: requirementsArg,
      filter_scopes: z
        .array(z.string())
        .optional()
        .describe("Filter scopes to apply; overrides the configured and document-level lists"),
    }),
  }, async ({ requirements, filter_scopes }: {
    requirements: string;
    filter_scopes?: string[];
  }): Promise<CallToolResult> =>
    withDocument(requirements, (doc) => {
      const files = generateSqlx(doc, {
        filterScopes: filter_scopes ?? config.filterScopes,
      });
      return ok({ files: Object.fromEntries(files) });
    }),
  );
}

/** generate_tests: one SQL test script per model */
function registerGenerateTests(server: McpServer): void {
  server.registerTool("generate_tests", {
    title: "Generate Tests",
    description:
      "Generates a SQL test script per model with fixture temp tables and assertions.",
    inputSchema: z.object({
      requirements: requirementsArg,
      source: z.string().optional().describe("Label recorded in the test header"),
    }),
  }, async ({ requirements, source }: {
    requirements: string;
    source?: string;
  }): Promise<CallToolResult> =>
    withDocument(requirements, (doc) => {
      const files: Record<string, string> = {};
      for (const model of doc.models) {
        files[`test_req_${model.name}.sql`] = generateTestSql(doc, model, source ?? "inline");
      }
      return ok({ files });
    }),
  );
}

/** describe_model: parsed model, its SQLX and its mapping document */
function registerDescribeModel(server: McpServer, config: PipelineConfig): void {
  server.registerTool("describe_model", {
    title: "Describe Model",
    description:
      "Returns one model of a requirements document with its generated SQLX and mapping document.",
    inputSchema: z.object({
      requirements: requirementsArg,
      model: z.string().describe("Model name, e.g. 'stg_customers'"),
    }),
  }, async ({ requirements, model }: {
    requirements: string;
    model: string;
  }): Promise<CallToolResult> =>
    withDocument(requirements, (doc) => {
      const found = doc.models.find((m) => m.name === model);
      if (!found) {
        return err(
          `Model "${model}" not found. Available: ${doc.models.map((m) => m.name).join(", ") || "(none)"}`,
        );
      }
      return ok({
        model: found,
        sqlx: buildSqlx(found, doc.schema.staging_schema, doc.schema.final_schema, {
          filterScopes: config.filterScopes ?? doc.filter_scopes,
        }),
        mappingDoc: renderModelDoc(found),
      });
    }),
  );
}

// --- Helpers ---

function withDocument(
  requirements: string,
  handle: (doc: RequirementsDocument) => CallToolResult,
): CallToolResult {
  try {
    return handle(parseRequirements(requirements));
  } catch (e) {
    return err(e instanceof Error ? e.message : String(e));
  }
}

function ok(data: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
  };
}

function err(message: string): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ error: { code: "error", message } }) }],
    isError: true,
  };
}
