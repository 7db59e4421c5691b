import * as path from "node:path";
import { PlanExecutor, type PlanExecutorOptions } from "../execution/planExecutor.js";
import type { ProcessRunner } from "../execution/runner.js";
import { parsePlanText, validatePlan, assessPlanQuality, createFallbackPlan } from "../plan/validate.js";
import type { InvestigationPlan } from "../plan/schema.js";
import { gatherAnalysisContext } from "../analysis/context.js";
import { runChunkedAnalysis, saveAnalysisResult, type ChunkedAnalysisReport } from "../analysis/chunkedAnalysis.js";
import { withRateLimitRetry, type RetryPolicy } from "../analysis/backoff.js";
import { createTokenCounter, type TokenCounter } from "../analysis/tokens.js";
import { buildDeeperPlan, deeperRoot, escalationReasons, runDeeperAnalysis } from "./deeper.js";
import { describeLlmError, type InvestigationAgents } from "../llm/agents.js";
import { runDirectoryName, updateIndexEntry, writeJSON, fileTimestamp, EVIDENCE_SUBDIRS } from "../storage/index.js";
import type { ForensicsConfig } from "../config.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import type {
  AnalysisResult,
  IndexEntry,
  InvestigationOutcome,
  InvestigationStage,
  RunResult,
} from "../types.js";

export interface InvestigationRequest {
  dumpPath: string;
  osHint?: string;
  userPrompt?: string;
  id?: string;
}

export interface InvestigationDeps {
  agents: InvestigationAgents;
  config: ForensicsConfig;
  runner?: ProcessRunner;
  countTokens?: TokenCounter;
  /** Where index.json lives; defaults to the configured evidence base. */
  dataDir?: string;
  logger?: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface StageTransition {
  from: InvestigationStage;
  to: InvestigationStage;
  at: string;
  reason: string;
}

export interface DeeperOutcome {
  source: "model" | "fallback";
  commands: string[];
  run: RunResult | null;
  analysis: AnalysisResult | null;
  analysis_file: string | null;
}

export interface InvestigationState {
  id: string;
  dump_path: string;
  os_hint: string;
  stage: InvestigationStage;
  /** Planning attempts so far; the only guard on the planning loop. */
  retry_count: number;
  plan: InvestigationPlan | null;
  plan_source: "model" | "fallback" | null;
  feedback: string | null;
  quality_warnings: string[];
  evidence_directory: string | null;
  run: RunResult | null;
  analysis: AnalysisResult | null;
  analysis_file: string | null;
  escalation_reasons: string[];
  deeper: DeeperOutcome | null;
  outcome: InvestigationOutcome | null;
  error: string | null;
  transitions: StageTransition[];
  created_at: string;
}

type PendingPlan = { kind: "text"; text: string } | { kind: "fallback"; plan: InvestigationPlan };

export class Investigation {
  private readonly deps: InvestigationDeps;
  private readonly request: InvestigationRequest;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly retry: RetryPolicy;
  private countTokens: TokenCounter | undefined;
  private pending: PendingPlan | null = null;
  private current: InvestigationState;

  constructor(request: InvestigationRequest, deps: InvestigationDeps) {
    this.request = request;
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
    const created = this.now();
    const id = request.id ?? runDirectoryName(request.dumpPath, created);
    this.log = (deps.logger ?? rootLogger).child({ component: "investigation", investigation: id });
    this.countTokens = deps.countTokens;
    this.retry = {
      maxRetries: deps.config.maxRetries,
      baseDelaySeconds: deps.config.rateLimitDelay,
      maxDelaySeconds: deps.config.maxRateLimitDelay,
      sleep: deps.sleep,
      logger: this.log,
    };
    this.current = {
      id,
      dump_path: request.dumpPath,
      os_hint: request.osHint ?? "windows",
      stage: "planning",
      retry_count: 0,
      plan: null,
      plan_source: null,
      feedback: null,
      quality_warnings: [],
      evidence_directory: null,
      run: null,
      analysis: null,
      analysis_file: null,
      escalation_reasons: [],
      deeper: null,
      outcome: null,
      error: null,
      transitions: [],
      created_at: created.toISOString(),
    };
  }

  get state(): Readonly<InvestigationState> {
    return this.current;
  }

  /** Steps until `done`. Every path through the stages reaches it. */
  async run(): Promise<InvestigationState> {
    await this.syncIndex();
    while (this.current.stage !== "done") {
      await this.step();
    }
    await this.saveReport();
    return this.current;
  }

  async step(): Promise<InvestigationStage> {
    switch (this.current.stage) {
      case "planning":
        await this.plan();
        break;
      case "validating":
        await this.validate();
        break;
      case "evaluating":
        await this.evaluate();
        break;
      case "executing":
        await this.execute();
        break;
      case "triaging":
        await this.triage();
        break;
      case "deeper_analysis":
        await this.deeperAnalysis();
        break;
      case "done":
        break;
    }
    return this.current.stage;
  }

  // ── Stages ──

  private async plan(): Promise<void> {
    this.current.retry_count += 1;
    const { dump_path: dumpPath, os_hint: osHint } = this.current;
    const result = await withRateLimitRetry(
      () =>
        this.deps.agents.plan({
          dumpPath,
          osHint,
          userPrompt: this.request.userPrompt,
          feedback: this.current.feedback ?? undefined,
          attempt: this.current.retry_count,
        }),
      this.retry
    );

    if (result.ok) {
      this.pending = { kind: "text", text: result.value };
      this.current.plan_source = "model";
    } else {
      this.log.warn("Planner unavailable, using fallback plan", { error: describeLlmError(result.error) });
      this.pending = { kind: "fallback", plan: createFallbackPlan(dumpPath, osHint) };
      this.current.plan_source = "fallback";
    }
    await this.transition("validating", `planning attempt ${this.current.retry_count}`);
  }

  private async validate(): Promise<void> {
    const pending = this.pending;
    this.pending = null;
    let plan: InvestigationPlan;
    try {
      if (!pending) {
        throw new Error("No plan to validate");
      }
      plan = pending.kind === "fallback" ? pending.plan : validatePlan(parsePlanText(pending.text));
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this.current.feedback = `Plan validation failed: ${message}`;
      await this.retryOrGiveUp(this.current.feedback);
      return;
    }

    this.current.plan = plan;
    this.current.quality_warnings = assessPlanQuality(plan);
    for (const warning of this.current.quality_warnings) {
      this.log.warn("Plan quality", { warning });
    }
    await this.transition("evaluating", "plan conforms to schema");
  }

  private async evaluate(): Promise<void> {
    const plan = this.current.plan;
    if (!plan) {
      await this.retryOrGiveUp("No validated plan to evaluate");
      return;
    }
    const verdict = await withRateLimitRetry(() => this.deps.agents.evaluate(plan), this.retry);
    if (verdict.ok && verdict.value.success_criteria_met) {
      this.current.feedback = null;
      await this.transition("executing", "evaluator approved plan");
      return;
    }
    this.current.feedback = verdict.ok
      ? verdict.value.feedback || "Evaluator rejected the plan"
      : `Evaluation failed: ${describeLlmError(verdict.error)}`;
    await this.retryOrGiveUp(this.current.feedback);
  }

  private async execute(): Promise<void> {
    const plan = this.current.plan;
    if (!plan) {
      await this.finish("failed", "no plan to execute");
      return;
    }
    const evidenceDir = path.join(this.deps.config.evidenceBaseDir, this.current.id);
    this.current.evidence_directory = evidenceDir;

    let run: RunResult;
    try {
      run = await new PlanExecutor(this.executorOptions()).run(plan, evidenceDir);
    } catch (err: unknown) {
      // evidence_dir_unwritable and other hard errors end the investigation as failed
      this.current.error = err instanceof Error ? err.message : String(err);
      this.log.error("Execution aborted", { error: this.current.error });
      await this.finish("failed", "execution aborted");
      return;
    }

    this.current.run = run;
    const status = run.execution_status;
    if (status === "completed" || status === "partial") {
      await this.transition("triaging", `execution ${status}`);
    } else {
      await this.finish("failed", `execution ${status}`);
    }
  }

  private async triage(): Promise<void> {
    const run = this.current.run;
    const evidenceDir = this.current.evidence_directory;
    if (!run || !evidenceDir) {
      await this.finish("failed", "nothing to analyze");
      return;
    }

    const report = await this.analyze(run, evidenceDir);
    this.current.analysis = report.result;
    this.current.analysis_file = await saveAnalysisResult(
      report.result,
      evidenceDir,
      report.mode === "single" ? "single" : "combined",
      { case_id: run.case_id, execution_status: run.execution_status, total_chunks: report.total_chunks },
      this.now()
    );

    const reasons = escalationReasons(report.result, {
      threatScore: this.deps.config.threatScoreThreshold,
      confidence: this.deps.config.confidenceThreshold,
    });
    this.current.escalation_reasons = reasons;
    if (reasons.length > 0) {
      await this.transition("deeper_analysis", reasons.join("; "));
    } else {
      await this.finish(run.execution_status, "no escalation triggers");
    }
  }

  private async deeperAnalysis(): Promise<void> {
    const analysis = this.current.analysis;
    const evidenceDir = this.current.evidence_directory;
    const outcome: InvestigationOutcome = this.current.run?.execution_status ?? "failed";
    if (!analysis || !evidenceDir) {
      await this.finish(outcome, "no triage analysis");
      return;
    }

    const plan = await buildDeeperPlan(analysis.suspicious_findings, this.current.dump_path, this.current.os_hint, this.deps.agents);
    const deeper: DeeperOutcome = { source: plan.source, commands: plan.commands, run: null, analysis: null, analysis_file: null };
    this.current.deeper = deeper;
    if (plan.commands.length === 0) {
      await this.finish(outcome, "no targeted commands for deeper analysis");
      return;
    }

    const root = deeperRoot(evidenceDir);
    const run = await runDeeperAnalysis(plan, evidenceDir, this.executorOptions());
    deeper.run = run;
    const report = await this.analyze(run, root);
    deeper.analysis = report.result;
    deeper.analysis_file = await saveAnalysisResult(
      report.result,
      root,
      "deeper",
      { case_id: run.case_id, plan_source: plan.source, commands: plan.commands },
      this.now()
    );
    // One escalation pass only.
    await this.finish(outcome, "deeper analysis complete");
  }

  // ── Helpers ──

  private async analyze(run: RunResult, evidenceDir: string): Promise<ChunkedAnalysisReport> {
    const context = await gatherAnalysisContext(run, evidenceDir);
    if (!this.countTokens) {
      this.countTokens = createTokenCounter(this.deps.config.analyzerModel);
    }
    return runChunkedAnalysis(context, (text, chunk) => this.deps.agents.analyze(text, chunk), {
      evidenceDir,
      maxChunkTokens: this.deps.config.maxChunkTokens,
      concurrency: this.deps.config.chunkConcurrency,
      countTokens: this.countTokens,
      retry: this.retry,
      source: { investigation_id: this.current.id, dump_path: this.current.dump_path },
      logger: this.log,
      now: this.now,
    });
  }

  private executorOptions(): Omit<PlanExecutorOptions, "ledger"> {
    return {
      timeoutSeconds: this.deps.config.volatilityTimeout,
      volatilityPath: this.deps.config.volatilityPath,
      runner: this.deps.runner,
      logger: this.log,
      now: this.now,
      caseId: this.current.id,
    };
  }

  private async retryOrGiveUp(reason: string): Promise<void> {
    if (this.current.retry_count < this.deps.config.maxPlanRetries) {
      await this.transition("planning", reason);
      return;
    }
    this.log.error("Planning attempts exhausted", { attempts: this.current.retry_count, reason });
    await this.finish("failed", `planning attempts exhausted after ${this.current.retry_count}: ${reason}`);
  }

  private async finish(outcome: InvestigationOutcome, reason: string): Promise<void> {
    this.current.outcome = outcome;
    await this.transition("done", reason);
  }

  private async transition(to: InvestigationStage, reason: string): Promise<void> {
    const from = this.current.stage;
    this.current.transitions.push({ from, to, at: this.now().toISOString(), reason });
    this.current.stage = to;
    this.log.info("Stage transition", { from, to, reason });
    await this.syncIndex();
  }

  private async syncIndex(): Promise<void> {
    const entry: IndexEntry = {
      id: this.current.id,
      dump_path: this.current.dump_path,
      os_hint: this.current.os_hint,
      evidence_directory: this.current.evidence_directory,
      stage: this.current.stage,
      outcome: this.current.outcome,
      threat_score: this.current.deeper?.analysis?.threat_score ?? this.current.analysis?.threat_score ?? null,
      created_at: this.current.created_at,
      updated_at: this.now().toISOString(),
    };
    await updateIndexEntry(entry, this.deps.dataDir ?? this.deps.config.evidenceBaseDir);
  }

  private async saveReport(): Promise<void> {
    const evidenceDir = this.current.evidence_directory;
    if (!evidenceDir || !this.current.run) return;
    const file = path.join(evidenceDir, EVIDENCE_SUBDIRS.logs, `investigation_report_${fileTimestamp(this.now())}.json`);
    await writeJSON(file, this.current);
  }
}
