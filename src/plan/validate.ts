import * as fs from "node:fs/promises";
import { ZodError, type z } from "zod";
import {
  ExecutablePlanSchema,
  InvestigationPlanSchema,
  type ExecutablePlan,
  type InvestigationPlan,
} from "./schema.js";
import { isErrnoException } from "../storage/index.js";
import { buildCommand } from "../execution/safety.js";

export class PlanValidationError extends Error {
  readonly code = "invalid_plan";
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n${issues.map((i) => `- ${i}`).join("\n")}` : message);
    this.name = "PlanValidationError";
    this.issues = issues;
  }
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

/** Strips Markdown fences the planner tends to wrap around JSON, then parses. */
export function parsePlanText(text: string): unknown {
  const cleaned = text
    .replace(/^\s*```(?:json)?\s*/i, "")
    .replace(/\s*```\s*$/, "")
    .replace(/```/g, "")
    .trim();
  try {
    return JSON.parse(cleaned);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PlanValidationError(`Failed to parse plan JSON: ${reason}`);
  }
}

function check<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, label: string): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new PlanValidationError(`${label} does not conform to schema`, formatIssues(parsed.error));
  }
  return parsed.data;
}

export function validatePlan(data: unknown): InvestigationPlan {
  return check(InvestigationPlanSchema, data, "Investigation plan");
}

export function validateExecutablePlan(data: unknown): ExecutablePlan {
  return check(ExecutablePlanSchema, data, "Execution plan");
}

export async function readPlanText(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      throw Object.assign(new Error(`Plan file not found: ${filePath}`), { code: "plan_not_found" });
    }
    throw err;
  }
}

export async function loadPlanFile(filePath: string, options: { strict?: boolean } = {}): Promise<ExecutablePlan> {
  const data = parsePlanText(await readPlanText(filePath));
  return options.strict ? validatePlan(data) : validateExecutablePlan(data);
}

// ── Quality checks (advisory) ──

const PHASE_FAMILIES: Array<{ label: string; keywords: string[] }> = [
  { label: "Triage", keywords: ["triage", "initial", "baseline"] },
  { label: "Process", keywords: ["process", "execution"] },
  { label: "Network", keywords: ["network", "connection", "communication"] },
  { label: "Persistence", keywords: ["persistence", "autostart", "startup"] },
  { label: "Memory", keywords: ["memory", "artifact", "injection"] },
  { label: "Timeline", keywords: ["timeline", "temporal", "chronological"] },
];

const PLACEHOLDER_MARKERS = [
  "PLACEHOLDER", "TODO", "FIXME", "INSERT_", "CHANGE_THIS",
  "REPLACE_ME", "YOUR_", "EXAMPLE_", "SAMPLE_",
];

const ANALYSIS_STEP_WORDS = ["analysis", "investigation", "detection", "hunting"];

export function isPlaceholderCommand(command: string): boolean {
  const upper = command.trim().toUpperCase();
  if (upper.length < 2 || !/[A-Z]/.test(upper)) return true;
  return PLACEHOLDER_MARKERS.some((marker) => upper.includes(marker));
}

/** Advisory findings about a schema-valid plan. None of these block execution. */
export function assessPlanQuality(plan: InvestigationPlan): string[] {
  const warnings: string[] = [];

  if (plan.goals.length < 2) {
    warnings.push(`Insufficient goals: ${plan.goals.length} (minimum 2 recommended)`);
  }
  if (plan.global_triage.length < 1) {
    warnings.push("No global triage steps");
  }

  const phaseNames = plan.os_workflows.phases.map((p) => p.name.toLowerCase());
  const missing = PHASE_FAMILIES.filter((family) => !phaseNames.some((name) => family.keywords.some((k) => name.includes(k))));
  if (missing.length > 0) {
    warnings.push(`Missing phases: ${missing.map((f) => f.label).join(", ")}`);
  }

  for (const step of plan.global_triage) {
    for (const cmd of step.commands.filter(isPlaceholderCommand)) {
      warnings.push(`Placeholder command in global triage step '${step.name}': ${cmd}`);
    }
  }

  for (const phase of plan.os_workflows.phases) {
    if (phase.steps.length === 0) {
      warnings.push(`Phase '${phase.name}' has no steps`);
    }
    for (const step of phase.steps) {
      if (step.commands.length === 0) {
        warnings.push(`Step '${step.name}' in phase '${phase.name}' has no commands`);
      }
      for (const cmd of step.commands.filter(isPlaceholderCommand)) {
        warnings.push(`Placeholder command in step '${step.name}': ${cmd}`);
      }
      if (!step.parse_expectations) {
        warnings.push(`Step '${step.name}' missing parse_expectations`);
      }
      const lowered = step.name.toLowerCase();
      if (step.suspicion_heuristics.length === 0 && ANALYSIS_STEP_WORDS.some((w) => lowered.includes(w))) {
        warnings.push(`Analysis step '${step.name}' missing suspicion_heuristics`);
      }
    }
  }

  if (plan.reporting.export_formats.length === 0) {
    warnings.push("No export formats specified");
  }

  return warnings;
}

/** Minimal plan used when the planner call itself fails. */
export function createFallbackPlan(dumpPath: string, osHint: string | null): InvestigationPlan {
  const os = osHint === "linux" || osHint === "macos" || osHint === "windows" ? osHint : undefined;
  return {
    plan_version: "1.0.0-fallback",
    inputs: { dump_path: dumpPath, os_hint: os },
    goals: [
      "Identify malicious processes",
      "Analyze network connections",
      "Detect persistence mechanisms",
      "Extract memory artifacts",
    ],
    constraints: ["Planner unavailable - using fallback plan"],
    global_triage: [
      {
        name: "System Information",
        commands: [buildCommand(dumpPath, "windows.info")],
        parse_expectations: "System details and memory layout",
        suspicion_heuristics: [],
        actions_on_hits: [],
        evidence_outputs: [],
      },
    ],
    os_workflows: { phases: [] },
    ioc_correlation: {
      hashing: [],
      network: [],
      yara: [],
      scoring: {
        process: "Score suspicious processes by anomalous parents, command lines, unsigned binaries",
        module: "Score modules by unexpected load paths or unsigned status",
        persistence_item: "Score persistence by abnormal autoruns or registry/service modifications",
      },
    },
    artifact_preservation: { directory_structure: [], chain_of_custody: [] },
    reporting: { executive_summary: [], technical_appendix: [], export_formats: ["json"] },
  };
}
