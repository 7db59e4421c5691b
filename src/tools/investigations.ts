import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { listInvestigations } from "../storage/index.js";
import { loadConfig } from "../config.js";
import type { IndexEntry, InvestigationStage } from "../types.js";

export async function listInvestigationEntries(
  filter: { stage?: InvestigationStage } = {},
  dataDir: string = loadConfig().evidenceBaseDir
): Promise<IndexEntry[]> {
  const entries = await listInvestigations(dataDir);
  return filter.stage ? entries.filter((e) => e.stage === filter.stage) : entries;
}

export function registerInvestigationTools(server: McpServer): void {
  server.tool(
    "investigations_list",
    "List recorded investigations, newest first",
    {
      stage: z
        .enum(["planning", "validating", "evaluating", "executing", "triaging", "deeper_analysis", "done"])
        .optional()
        .describe("Only investigations currently at this stage"),
    },
    async (args) => {
      const entries = await listInvestigationEntries({ stage: args.stage });
      return {
        content: [{ type: "text" as const, text: JSON.stringify(entries, null, 2) }],
      };
    }
  );
}
