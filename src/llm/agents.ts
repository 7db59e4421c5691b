import type { InvestigationPlan } from "../plan/schema.js";
import type { AnalysisResult, SuspiciousFinding } from "../types.js";

// ── Result type shared by every model-backed call ──

export type LlmError =
  | { kind: "rate_limited"; retryAfterSeconds?: number }
  | { kind: "other"; message: string };

export type LlmResult<T> = { ok: true; value: T } | { ok: false; error: LlmError };

export function llmOk<T>(value: T): LlmResult<T> {
  return { ok: true, value };
}

export function llmFailure<T>(message: string): LlmResult<T> {
  return { ok: false, error: { kind: "other", message } };
}

export function describeLlmError(error: LlmError): string {
  if (error.kind === "rate_limited") {
    return error.retryAfterSeconds !== undefined
      ? `Rate limited (retry after ${error.retryAfterSeconds}s)`
      : "Rate limited";
  }
  return error.message;
}

// ── Agent contract ──

export interface PlanRequest {
  dumpPath: string;
  osHint: string;
  userPrompt?: string;
  /** Evaluator or validator feedback from the previous attempt. */
  feedback?: string;
  attempt: number;
}

export interface EvaluationVerdict {
  success_criteria_met: boolean;
  feedback: string;
  user_input_needed: boolean;
}

export interface ChunkInfo {
  chunkId: string;
  index: number;
  total: number;
}

export interface DeeperPlanRequest {
  findings: SuspiciousFinding[];
  dumpPath: string;
  osHint: string;
}

export interface InvestigationAgents {
  /** Raw planner text; parsing and validation happen at the plan boundary. */
  plan(request: PlanRequest): Promise<LlmResult<string>>;
  evaluate(plan: InvestigationPlan): Promise<LlmResult<EvaluationVerdict>>;
  analyze(context: string, chunk: ChunkInfo | null): Promise<LlmResult<AnalysisResult>>;
  /** Targeted commands for the escalation pass. */
  planDeeper(request: DeeperPlanRequest): Promise<LlmResult<string[]>>;
}
