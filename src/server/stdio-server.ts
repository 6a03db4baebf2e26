/**
 * MCP server: exposes the pipeline tools and the template resource over
 * stdio. Logs go to stderr; stdout belongs to the protocol.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { PipelineConfig } from "../types/config.ts";
import { registerPipelineTools } from "./pipeline-tools.ts";
import { registerResources } from "./resources.ts";

/** Create a server with every pipeline tool registered */
export function createServer(config: PipelineConfig, version: string): McpServer {
  const server = new McpServer(
    { name: "pipespec", version },
    { capabilities: { logging: {} } },
  );

  registerPipelineTools(server, config);
  registerResources(server);
  return server;
}

/** Start the server on stdio and keep it running until a signal arrives */
export async function startServer(
  config: PipelineConfig,
  version: string,
): Promise<void> {
  const server = createServer(config, version);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[pipespec] MCP server running on stdio");

  const shutdown = () => {
    console.error("[pipespec] Shutting down...");
    server
      .close()
      .then(() => process.exit(0))
      .catch((err) => {
        console.error("[pipespec] Shutdown failed:", err);
        process.exit(1);
      });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}
