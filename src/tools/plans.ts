import * as path from "node:path";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import {
  loadPlanFile,
  readPlanText,
  validatePlan,
  parsePlanText,
  assessPlanQuality,
  PlanValidationError,
} from "../plan/validate.js";
import { PlanExecutor } from "../execution/planExecutor.js";
import type { ProcessRunner } from "../execution/runner.js";
import { loadConfig, type ForensicsConfig } from "../config.js";
import { runDirectoryName } from "../storage/index.js";
import type { ExecutablePlan } from "../plan/schema.js";
import type { RunResult } from "../types.js";

export interface PlanValidationReport {
  file: string;
  valid: boolean;
  plan_version: string | null;
  triage_steps: number;
  phases: number;
  commands: number;
  issues: string[];
  warnings: string[];
}

function countCommands(plan: ExecutablePlan): number {
  const triage = plan.global_triage.reduce((n, s) => n + s.commands.length, 0);
  return plan.os_workflows.phases.reduce((n, p) => n + p.steps.reduce((m, s) => m + s.commands.length, 0), triage);
}

/** Full-schema check plus advisory warnings. Missing files still throw. */
export async function validatePlanFile(filePath: string): Promise<PlanValidationReport> {
  const file = path.resolve(filePath);
  const text = await readPlanText(file);
  try {
    const plan = validatePlan(parsePlanText(text));
    return {
      file,
      valid: true,
      plan_version: plan.plan_version,
      triage_steps: plan.global_triage.length,
      phases: plan.os_workflows.phases.length,
      commands: countCommands(plan),
      issues: [],
      warnings: assessPlanQuality(plan),
    };
  } catch (err: unknown) {
    if (err instanceof PlanValidationError) {
      return {
        file,
        valid: false,
        plan_version: null,
        triage_steps: 0,
        phases: 0,
        commands: 0,
        issues: err.issues.length > 0 ? err.issues : [err.message],
        warnings: [],
      };
    }
    throw err;
  }
}

export interface ExecutePlanOptions {
  evidenceDir?: string;
  config?: ForensicsConfig;
  runner?: ProcessRunner;
  now?: () => Date;
}

export async function executePlanFile(filePath: string, options: ExecutePlanOptions = {}): Promise<RunResult> {
  const config = options.config ?? loadConfig();
  const plan = await loadPlanFile(filePath);
  const now = options.now ?? (() => new Date());
  const evidenceDir =
    options.evidenceDir ?? path.join(config.evidenceBaseDir, runDirectoryName(plan.inputs.dump_path, now()));

  const executor = new PlanExecutor({
    timeoutSeconds: config.volatilityTimeout,
    volatilityPath: config.volatilityPath,
    runner: options.runner,
    now: options.now,
  });
  return executor.run(plan, evidenceDir);
}

export function registerPlanTools(server: McpServer): void {
  server.tool(
    "plan_validate",
    "Validate an investigation plan JSON file and report quality warnings",
    {
      file: z.string().describe("Path to the plan JSON file"),
    },
    async (args) => {
      const result = await validatePlanFile(args.file);
      return {
        content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
      };
    }
  );

  server.tool(
    "plan_execute",
    "Execute a plan's triage steps and phases against the memory image; returns the run summary",
    {
      file: z.string().describe("Path to the plan JSON file"),
      evidence_dir: z.string().optional().describe("Run directory (default: new directory under the evidence base)"),
    },
    async (args) => {
      const run = await executePlanFile(args.file, { evidenceDir: args.evidence_dir });
      const result = {
        case_id: run.case_id,
        execution_status: run.execution_status,
        summary: run.summary,
        triage_summary: run.triage_summary,
        phases: run.phases.map((p) => ({ phase_name: p.phase_name, category: p.category, ...p.summary })),
      };
      return {
        content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
      };
    }
  );
}
