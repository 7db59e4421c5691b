import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { registerCommandTools } from "./tools/commands.js";
import { registerPlanTools } from "./tools/plans.js";
import { registerChunkTools } from "./tools/chunks.js";
import { registerInvestigationTools } from "./tools/investigations.js";
import { VERSION } from "./version.js";

export function createMcpServer(): McpServer {
  const server = new McpServer({
    name: "memprobe",
    version: VERSION,
  });

  registerCommandTools(server);
  registerPlanTools(server);
  registerChunkTools(server);
  registerInvestigationTools(server);
  return server;
}

export async function startMcpServer(): Promise<void> {
  const transport = new StdioServerTransport();
  await createMcpServer().connect(transport);
}
