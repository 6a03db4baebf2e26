/**
 * MCP Resources: expose the requirements document format so the consuming
 * LLM can author documents the parser understands.
 */

import { readFile } from "node:fs/promises";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ReadResourceResult } from "@modelcontextprotocol/sdk/types.js";
import { TEMPLATE_PATH } from "../project/template.ts";

/** Register the sample requirements document as a resource */
export function registerResources(server: McpServer): void {
  server.registerResource(
    "requirements-template",
    "pipespec://template",
    {
      title: "Requirements document template",
      description:
        "A complete sample requirements document: YAML configuration, model sections and their typed tables. Read this before writing one.",
      mimeType: "text/markdown",
    },
    async (uri): Promise<ReadResourceResult> => ({
      contents: [
        {
          uri: uri.href,
          mimeType: "text/markdown",
          text: await readFile(TEMPLATE_PATH, "utf-8"),
        },
      ],
    }),
  );
}
