import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { logger } from "./logger.js";
import { registerFusionTools } from "./tools/fusion.js";

export const VERSION = "1.0.0";

export function createMcpServer(): McpServer {
  const server = new McpServer({
    name: "scan-fusion",
    version: VERSION,
  });

  registerFusionTools(server);
  return server;
}

export async function startMcpServer(): Promise<void> {
  const server = createMcpServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("MCP server listening on stdio");
}
