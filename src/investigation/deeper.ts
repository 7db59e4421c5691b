import * as path from "node:path";
import { launcherPrefix } from "../execution/safety.js";
import { DeduplicationLedger } from "../execution/ledger.js";
import { PlanExecutor, type PlanExecutorOptions } from "../execution/planExecutor.js";
import { describeLlmError, type InvestigationAgents } from "../llm/agents.js";
import { DEEPER_SUBDIR } from "../storage/index.js";
import { logger } from "../logger.js";
import type { ExecutablePlan } from "../plan/schema.js";
import type { AnalysisResult, RunResult, SuspiciousFinding } from "../types.js";

export interface EscalationThresholds {
  threatScore: number;
  confidence: number;
}

export const ESCALATION_FINDING_TYPES = ["code_injection", "persistence", "network_activity"];

export type DeeperCategory = "code_injection" | "persistence" | "network_activity" | "process_anomalies" | "timeline_analysis";

/** Plugin invocations appended to `vol -f <dump>`. `{pid}` expands per target PID. */
export const DEEPER_ANALYSIS_COMMANDS: Record<DeeperCategory, string[]> = {
  code_injection: ["windows.malfind", "windows.hollowfind", "windows.injected", "windows.dumpfiles --pid {pid}"],
  persistence: [
    "windows.registry.printkey --key 'Software\\Microsoft\\Windows\\CurrentVersion\\Run'",
    "windows.registry.printkey --key 'Software\\Microsoft\\Windows\\CurrentVersion\\RunOnce'",
    "windows.registry.printkey --key 'Software\\Microsoft\\Windows\\CurrentVersion\\RunOnceEx'",
    "windows.registry.printkey --key 'Software\\Microsoft\\Windows NT\\CurrentVersion\\Winlogon'",
    "windows.svcscan",
    "windows.scheduled_tasks",
  ],
  network_activity: ["windows.netscan", "windows.netstat", "windows.connections", "windows.dnsresolver"],
  process_anomalies: ["windows.pslist", "windows.pstree", "windows.cmdline", "windows.handles --pid {pid}"],
  timeline_analysis: ["timeliner.timeline", "windows.mftscan.mftparser", "windows.shellbags"],
};

const TEMPLATES_PER_CATEGORY = 3;
const PIDS_PER_TEMPLATE = 2;
const MAX_DEEPER_COMMANDS = 8;

const log = logger.child({ component: "deeper-analysis" });

// ── Escalation decision ──

export function escalationReasons(analysis: AnalysisResult, thresholds: EscalationThresholds): string[] {
  const reasons: string[] = [];
  if (analysis.threat_score >= thresholds.threatScore) {
    reasons.push(`threat score ${analysis.threat_score} >= ${thresholds.threatScore}`);
  }
  if (analysis.analysis_confidence < thresholds.confidence) {
    reasons.push(`confidence ${analysis.analysis_confidence} < ${thresholds.confidence}`);
  }
  for (const finding of analysis.suspicious_findings) {
    if (finding.severity.toLowerCase() === "high") {
      reasons.push(`high severity finding: ${finding.finding_type}`);
    }
    const type = finding.finding_type.toLowerCase();
    const critical = ESCALATION_FINDING_TYPES.find((t) => type.includes(t));
    if (critical) {
      reasons.push(`${critical} finding`);
    }
  }
  return reasons;
}

export function shouldTriggerDeeperAnalysis(analysis: AnalysisResult, thresholds: EscalationThresholds): boolean {
  return escalationReasons(analysis, thresholds).length > 0;
}

// ── Targeted plan ──

/** First matching category wins; a finding spends template budget in one category only. */
export function categoryForFinding(finding: SuspiciousFinding): DeeperCategory | null {
  const description = finding.description.toLowerCase();
  if (description.includes("inject")) return "code_injection";
  if (description.includes("persistence") || description.includes("registry")) return "persistence";
  if (description.includes("network") || description.includes("connection")) return "network_activity";
  if (finding.finding_type.toLowerCase().includes("process")) return "process_anomalies";
  return null;
}

export function extractPids(findings: readonly SuspiciousFinding[]): string[] {
  const pids = new Set<string>();
  for (const finding of findings) {
    for (const match of finding.evidence.matchAll(/pid[:\s]*(\d+)/gi)) {
      if (match[1]) pids.add(match[1]);
    }
  }
  return [...pids];
}

/**
 * Rule-based commands used when the model cannot propose any. Each category
 * contributes its first three fixed templates, then its `{pid}` templates once
 * per extracted PID (at most two). PID templates are dropped when no PID is known.
 */
export function fallbackDeeperCommands(findings: readonly SuspiciousFinding[], dumpPath: string): string[] {
  const categories = new Set<DeeperCategory>();
  for (const finding of findings) {
    const category = categoryForFinding(finding);
    if (category) categories.add(category);
  }
  const pids = extractPids(findings).slice(0, PIDS_PER_TEMPLATE);
  const prefix = launcherPrefix(dumpPath);

  const commands: string[] = [];
  for (const category of categories) {
    const templates = DEEPER_ANALYSIS_COMMANDS[category];
    for (const template of templates.filter((t) => !t.includes("{pid}")).slice(0, TEMPLATES_PER_CATEGORY)) {
      commands.push(`${prefix} ${template}`);
    }
    for (const template of templates.filter((t) => t.includes("{pid}"))) {
      for (const pid of pids) {
        commands.push(`${prefix} ${template.replace("{pid}", pid)}`);
      }
    }
  }
  return commands.slice(0, MAX_DEEPER_COMMANDS);
}

export interface DeeperPlan {
  source: "model" | "fallback";
  commands: string[];
  plan: ExecutablePlan;
}

export async function buildDeeperPlan(
  findings: SuspiciousFinding[],
  dumpPath: string,
  osHint: string,
  agents: InvestigationAgents | null
): Promise<DeeperPlan> {
  let commands: string[] = [];
  let source: DeeperPlan["source"] = "fallback";

  if (agents) {
    const proposed = await agents.planDeeper({ findings, dumpPath, osHint });
    if (proposed.ok && proposed.value.length > 0) {
      commands = proposed.value.slice(0, MAX_DEEPER_COMMANDS);
      source = "model";
    } else {
      log.warn("Using rule-based deeper plan", {
        reason: proposed.ok ? "model proposed no commands" : describeLlmError(proposed.error),
      });
    }
  }
  if (source === "fallback") {
    commands = fallbackDeeperCommands(findings, dumpPath);
  }

  return {
    source,
    commands,
    plan: {
      plan_version: source === "model" ? "deeper_v1.0" : "fallback_v1.0",
      inputs: { dump_path: dumpPath, os_hint: osHint },
      global_triage: [
        {
          name: "Targeted Deeper Analysis",
          commands,
          parse_expectations: "Confirm or rule out triage findings",
          suspicion_heuristics: ["Suspicious or malicious activity confirmed by targeted plugins"],
          actions_on_hits: [],
          evidence_outputs: [],
        },
      ],
      os_workflows: { phases: [] },
    },
  };
}

/**
 * Executes the targeted plan under `<run>/deeper_analysis/` with its own
 * ledger, so commands already run during triage execute again here.
 */
export async function runDeeperAnalysis(
  plan: DeeperPlan,
  evidenceDir: string,
  options: Omit<PlanExecutorOptions, "ledger"> = {}
): Promise<RunResult> {
  const executor = new PlanExecutor({ ...options, ledger: new DeduplicationLedger() });
  log.info("Running deeper analysis", { source: plan.source, commands: plan.commands.length });
  return executor.run(plan.plan, deeperRoot(evidenceDir));
}

export function deeperRoot(evidenceDir: string): string {
  return path.join(evidenceDir, DEEPER_SUBDIR);
}
