import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { ProcessOutcome, ProcessRunner } from "../execution/runner.js";
import type {
  ChunkInfo,
  DeeperPlanRequest,
  EvaluationVerdict,
  InvestigationAgents,
  LlmResult,
  PlanRequest,
} from "../llm/agents.js";
import type { InvestigationPlan } from "../plan/schema.js";
import { Logger } from "../logger.js";
import type { AnalysisResult, ChunkResult } from "../types.js";

export const FIXED_TIME = "2026-01-15T10:30:00.000Z";
export const FIXED_STAMP = "20260115_103000";
export const DUMP = "/cases/mem.raw";

export const fixedClock = (): Date => new Date(FIXED_TIME);

export const quietLogger = new Logger({ test: true }, "error");

export const charCounter = (text: string): number => text.length;

export async function tempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `memprobe-${prefix}-`));
}

/** assert.rejects predicate matching the `code` the app attaches to its errors. */
export function hasCode(code: string): (err: unknown) => boolean {
  return (err) => err instanceof Error && "code" in err && err.code === code;
}

export function vol(plugin: string, ...args: string[]): string {
  return [`vol -f ${DUMP} ${plugin}`, ...args].join(" ");
}

// ── Process runner ──

export type FakeResponse = Partial<ProcessOutcome>;

/** Answers by plugin name (argv[3]); unknown plugins succeed with no output. */
export class FakeRunner implements ProcessRunner {
  readonly calls: string[][] = [];
  readonly timeouts: number[] = [];
  private readonly responses: Map<string, FakeResponse>;
  private readonly fallback: FakeResponse;

  constructor(responses: Record<string, FakeResponse> = {}, fallback: FakeResponse = {}) {
    this.responses = new Map(Object.entries(responses));
    this.fallback = fallback;
  }

  async run(argv: readonly string[], timeoutMs: number): Promise<ProcessOutcome> {
    this.calls.push([...argv]);
    this.timeouts.push(timeoutMs);
    const plugin = argv[3] ?? "";
    const response = this.responses.get(plugin) ?? this.fallback;
    return { stdout: "", stderr: "", exitCode: 0, timedOut: false, error: null, ...response };
  }
}

// ── Model-backed agents ──

/** Each queue repeats its last entry once the earlier ones are used. */
function next<T>(queue: T[], label: string): T {
  const item = queue.length > 1 ? queue.shift() : queue[0];
  if (item === undefined) {
    throw new Error(`FakeAgents: no ${label} response configured`);
  }
  return item;
}

export interface FakeAgentScript {
  plans?: Array<LlmResult<string>>;
  evaluations?: Array<LlmResult<EvaluationVerdict>>;
  analyses?: Array<LlmResult<AnalysisResult>>;
  deeper?: Array<LlmResult<string[]>>;
}

export class FakeAgents implements InvestigationAgents {
  readonly planRequests: PlanRequest[] = [];
  readonly evaluated: InvestigationPlan[] = [];
  readonly analyzed: Array<{ text: string; chunk: ChunkInfo | null }> = [];
  readonly deeperRequests: DeeperPlanRequest[] = [];
  private readonly script: Required<FakeAgentScript>;

  constructor(script: FakeAgentScript = {}) {
    this.script = {
      plans: script.plans ?? [],
      evaluations: script.evaluations ?? [{ ok: true, value: { success_criteria_met: true, feedback: "", user_input_needed: false } }],
      analyses: script.analyses ?? [{ ok: true, value: analysis() }],
      deeper: script.deeper ?? [{ ok: false, error: { kind: "other", message: "no deeper planner" } }],
    };
  }

  async plan(request: PlanRequest): Promise<LlmResult<string>> {
    this.planRequests.push(request);
    return next(this.script.plans, "plan");
  }

  async evaluate(plan: InvestigationPlan): Promise<LlmResult<EvaluationVerdict>> {
    this.evaluated.push(plan);
    return next(this.script.evaluations, "evaluation");
  }

  async analyze(text: string, chunk: ChunkInfo | null): Promise<LlmResult<AnalysisResult>> {
    this.analyzed.push({ text, chunk });
    return next(this.script.analyses, "analysis");
  }

  async planDeeper(request: DeeperPlanRequest): Promise<LlmResult<string[]>> {
    this.deeperRequests.push(request);
    return next(this.script.deeper, "deeper plan");
  }
}

// ── Fixtures ──

export function analysis(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  return {
    suspicious_findings: [],
    threat_score: 2,
    key_indicators: [],
    recommended_actions: [],
    executive_summary: "Nothing notable",
    analysis_confidence: 0.9,
    ...overrides,
  };
}

export function chunkResult(chunkId: string, overrides: Partial<AnalysisResult> = {}): ChunkResult {
  return { ...analysis(overrides), chunk_id: chunkId, timestamp: FIXED_TIME };
}

/** A plan that passes the full schema, as a planner would return it. */
export function fullPlan(): Record<string, unknown> {
  return {
    plan_version: "1.0.0",
    inputs: { dump_path: DUMP, os_hint: "windows" },
    goals: ["Find injected code", "Find persistence"],
    constraints: ["Read-only analysis"],
    global_triage: [
      {
        name: "System Info",
        commands: [vol("windows.info")],
        parse_expectations: "OS build and kernel base",
        suspicion_heuristics: [],
        actions_on_hits: [],
        evidence_outputs: [],
      },
    ],
    os_workflows: {
      phases: [
        {
          name: "Process Analysis",
          steps: [
            {
              name: "Process listing",
              commands: [vol("windows.pslist")],
              parse_expectations: "Process tree",
              suspicion_heuristics: ["Suspicious parent processes"],
              actions_on_hits: [],
              evidence_outputs: [],
            },
          ],
        },
      ],
    },
    ioc_correlation: {
      hashing: [],
      network: [],
      yara: [],
      scoring: { process: "parent anomalies", module: "unsigned modules", persistence_item: "autoruns" },
    },
    artifact_preservation: { directory_structure: [], chain_of_custody: [] },
    reporting: { executive_summary: [], technical_appendix: [], export_formats: ["json"] },
  };
}
