import type { InvestigationPlan } from "../plan/schema.js";
import type { SuspiciousFinding } from "../types.js";
import type { ChunkInfo, PlanRequest } from "./agents.js";

const PLAN_SHAPE = `{
  "plan_version": "1.0.0",
  "inputs": { "dump_path": string, "os_hint": "windows" | "linux" | "macos" },
  "goals": string[],
  "constraints": string[],
  "global_triage": [Step],
  "os_workflows": { "phases": [{ "name": string, "steps": [Step] }] },
  "ioc_correlation": {
    "hashing": string[], "network": string[], "yara": string[],
    "scoring": { "process": string, "module": string, "persistence_item": string }
  },
  "artifact_preservation": { "directory_structure": string[], "chain_of_custody": string[] },
  "reporting": { "executive_summary": string[], "technical_appendix": string[], "export_formats": ("json"|"csv"|"pdf"|"md")[] }
}
Step = {
  "name": string, "commands": string[], "parse_expectations": string,
  "suspicion_heuristics": string[], "actions_on_hits": string[], "evidence_outputs": string[]
}`;

export function plannerSystemPrompt(dumpPath: string, osHint: string): string {
  return `You are a memory forensics lead planning a Volatility 3 investigation of a ${osHint} memory image.

Return ONE JSON object and nothing else, with this shape:
${PLAN_SHAPE}

Rules for commands:
- Every command has the form: vol -f ${dumpPath} <plugin> [args]
- No shell operators, pipes, redirection, variables or command substitution.
- Use real Volatility 3 plugin names for ${osHint} (for example ${osHint}.pslist).
- No placeholders such as <PID> or TODO; omit a command if its argument is unknown.

Cover triage, processes, network, persistence, memory artifacts and timeline as separate phases.
Suspicion heuristics should describe what would be unusual, suspicious, anomalous, injected or malicious in the output.`;
}

export function plannerUserPrompt(request: PlanRequest): string {
  const lines = [
    `Memory image: ${request.dumpPath}`,
    `Operating system: ${request.osHint}`,
    `Investigation request: ${request.userPrompt ?? "General compromise assessment"}`,
  ];
  if (request.feedback) {
    lines.push("", `Previous attempt ${request.attempt - 1} was rejected. Fix these problems:`, request.feedback);
  }
  return lines.join("\n");
}

export function evaluatorSystemPrompt(osHint: string): string {
  return `You review Volatility 3 investigation plans for a ${osHint} memory image before they run.

Check that every command names a real plugin for this OS, that arguments are valid,
and that the phases cover the investigation goals.

Reply with JSON only: {"success_criteria_met": boolean, "feedback": string, "user_input_needed": boolean}
Set success_criteria_met to false when any command would fail or the plan misses an obvious area.`;
}

export function evaluatorUserPrompt(plan: InvestigationPlan): string {
  return `Plan with ${plan.goals.length} goals and ${plan.os_workflows.phases.length} phases:\n${JSON.stringify(plan, null, 2)}`;
}

const ANALYSIS_SHAPE = `{
  "suspicious_findings": [{ "finding_type": string, "description": string, "severity": "low"|"medium"|"high"|"critical", "evidence": string, "score": number }],
  "threat_score": number (0-10),
  "key_indicators": string[],
  "recommended_actions": string[],
  "executive_summary": string,
  "analysis_confidence": number (0-1)
}`;

export function analyzerSystemPrompt(): string {
  return `You are a malware analyst reviewing Volatility 3 output from a memory image.

Identify code injection, process hollowing, persistence, suspicious network activity,
and process anomalies. Use finding_type values such as code_injection, persistence,
network_activity, process_anomalies, timeline_analysis. Quote process names and PIDs
in evidence as "pid: <number>".

Reply with JSON only:
${ANALYSIS_SHAPE}`;
}

export function analyzerUserPrompt(context: string, chunk: ChunkInfo | null): string {
  const header = chunk
    ? `Evidence part ${chunk.index + 1} of ${chunk.total} (${chunk.chunkId}). Judge this part on its own.`
    : "Complete evidence set.";
  return `${header}\n\n${context}`;
}

export function deeperSystemPrompt(dumpPath: string, osHint: string): string {
  return `You plan a focused follow-up on a ${osHint} memory image after initial triage raised concerns.

Propose at most 8 Volatility 3 commands that confirm or rule out the findings.
Each command has the form: vol -f ${dumpPath} <plugin> [args], with no shell operators.

Reply with JSON only: {"targeted_commands": string[], "rationale": string}`;
}

export function deeperUserPrompt(findings: readonly SuspiciousFinding[]): string {
  return `Findings from triage:\n${JSON.stringify(findings, null, 2)}`;
}
