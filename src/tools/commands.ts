import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { ValidatedCommand, type RejectionKind } from "../execution/safety.js";

export interface CommandCheckResult {
  command: string;
  safe: boolean;
  kind: RejectionKind | null;
  reason: string | null;
  argv: string[];
  plugin: string | null;
}

export function checkCommand(command: string): CommandCheckResult {
  const verdict = ValidatedCommand.from(command);
  if (!verdict.safe) {
    return { command, safe: false, kind: verdict.kind, reason: verdict.reason, argv: [], plugin: null };
  }
  return {
    command,
    safe: true,
    kind: null,
    reason: null,
    argv: [...verdict.command.argv],
    plugin: verdict.command.plugin,
  };
}

export function registerCommandTools(server: McpServer): void {
  server.tool(
    "command_check",
    "Run a command string through the safety gate without executing it",
    {
      command: z.string().describe("Full command, e.g. 'vol -f mem.raw windows.pslist'"),
    },
    async (args) => {
      const result = checkCommand(args.command);
      return {
        content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
      };
    }
  );
}
