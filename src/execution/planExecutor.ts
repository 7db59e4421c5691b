import * as path from "node:path";
import { CommandExecutor, summarizeResult, type ExecutorOptions } from "./executor.js";
import { DeduplicationLedger, reusedResult } from "./ledger.js";
import { categoryForPhase, fileTimestamp, writeJSON, caseIdFromDumpPath } from "../storage/index.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import type { ExecutablePlan, PlanStep } from "../plan/schema.js";
import type {
  CategoryHint,
  CommandResult,
  ExecutionContext,
  HeuristicHit,
  PhaseResult,
  RunResult,
  RunStatus,
  StepResult,
  TriageSummary,
} from "../types.js";

export const SUSPICION_KEYWORDS = ["unusual", "suspicious", "anomal", "inject", "hollow", "malicious"];

/** Output shorter than this never counts as a hit. */
export const MIN_SUSPICIOUS_OUTPUT_LENGTH = 100;

export interface PlanExecutorOptions extends ExecutorOptions {
  /** Shared across triage and phases; a fresh one is created per run when omitted. */
  ledger?: DeduplicationLedger;
  caseId?: string;
}

interface StepOutcome {
  step: StepResult;
  skipped: number;
}

// ── Statistics ──

export function successRate(successful: number, total: number): number {
  return total > 0 ? successful / total : 0;
}

export function statusFromSuccessRate(rate: number, total: number): RunStatus {
  if (total === 0) return "failed";
  if (rate >= 0.8) return "completed";
  if (rate >= 0.5) return "partial";
  return "failed";
}

export function isSuspiciousHeuristic(heuristic: string): boolean {
  const lower = heuristic.toLowerCase();
  return SUSPICION_KEYWORDS.some((k) => lower.includes(k));
}

/** One hit per (successful command, keyword-bearing heuristic) with enough output. */
export function applyHeuristics(heuristics: readonly string[], results: readonly CommandResult[], timestamp: string): HeuristicHit[] {
  const flagged = heuristics.filter(isSuspiciousHeuristic);
  const hits: HeuristicHit[] = [];
  for (const result of results) {
    if (result.status !== "success" || result.stdout.length <= MIN_SUSPICIOUS_OUTPUT_LENGTH) continue;
    for (const heuristic of flagged) {
      hits.push({ command: result.command, heuristic, timestamp, evidence_file: result.output_file });
    }
  }
  return hits;
}

// ── Executor ──

export class PlanExecutor {
  private readonly options: PlanExecutorOptions;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(options: PlanExecutorOptions = {}) {
    this.options = options;
    this.log = (options.logger ?? rootLogger).child({ component: "plan-executor" });
    this.now = options.now ?? (() => new Date());
  }

  async run(plan: ExecutablePlan, evidenceRoot: string): Promise<RunResult> {
    const ledger = this.options.ledger ?? new DeduplicationLedger();
    const executor = new CommandExecutor(evidenceRoot, {
      ...this.options,
      volatilityPath: this.options.volatilityPath ?? plan.inputs.volatility_path,
      logger: this.log,
    });
    await executor.prepare();

    const caseId = this.options.caseId ?? caseIdFromDumpPath(plan.inputs.dump_path);
    const executionStart = this.now().toISOString();
    this.log.info("Run started", { case_id: caseId, evidence_directory: executor.layout.root });

    // Global triage
    const triageSteps: StepResult[] = [];
    let triageSkipped = 0;
    for (const step of plan.global_triage) {
      const outcome = await this.runStep(step, "triage", { stage: "global_triage" }, executor, ledger);
      triageSteps.push(outcome.step);
      triageSkipped += outcome.skipped;
    }
    const triageTotal = sumOf(triageSteps, (s) => s.commands_executed);
    const triageSuccess = sumOf(triageSteps, (s) => s.successful_commands);
    const triageSummary: TriageSummary = {
      total_commands: triageTotal,
      successful_commands: triageSuccess,
      skipped_duplicates: triageSkipped,
      success_rate: successRate(triageSuccess, triageTotal),
    };
    this.log.info("Global triage complete", { ...triageSummary });

    // Phases
    const phases: PhaseResult[] = [];
    for (const phase of plan.os_workflows.phases) {
      const category = categoryForPhase(phase.name);
      const startTime = this.now().toISOString();
      const started = performance.now();
      const steps: StepResult[] = [];
      let skipped = 0;
      for (const step of phase.steps) {
        const outcome = await this.runStep(step, category, { stage: "phase", phase: phase.name }, executor, ledger);
        steps.push(outcome.step);
        skipped += outcome.skipped;
      }
      const total = sumOf(steps, (s) => s.commands_executed);
      const successful = sumOf(steps, (s) => s.successful_commands);
      const result: PhaseResult = {
        phase_name: phase.name,
        category,
        start_time: startTime,
        steps,
        summary: {
          execution_time: (performance.now() - started) / 1000,
          total_commands: total,
          successful_commands: successful,
          success_rate: successRate(successful, total),
          total_hits: sumOf(steps, (s) => s.suspicious_hits),
          skipped_duplicates: skipped,
          end_time: this.now().toISOString(),
        },
      };
      phases.push(result);
      this.log.info("Phase complete", { phase: phase.name, category, ...result.summary });
    }

    const detailedLog = await executor.saveExecutionSummary();

    const totalCommands = triageTotal + sumOf(phases, (p) => p.summary.total_commands);
    const successfulCommands = triageSuccess + sumOf(phases, (p) => p.summary.successful_commands);
    const rate = successRate(successfulCommands, totalCommands);
    const executionEnd = this.now();

    const run: RunResult = {
      plan_version: plan.plan_version,
      case_id: caseId,
      evidence_directory: executor.layout.root,
      execution_start: executionStart,
      execution_end: executionEnd.toISOString(),
      global_triage: triageSteps,
      triage_summary: triageSummary,
      phases,
      summary: {
        total_commands: totalCommands,
        successful_commands: successfulCommands,
        success_rate: rate,
        total_suspicious_hits:
          sumOf(triageSteps, (s) => s.suspicious_hits) + sumOf(phases, (p) => p.summary.total_hits),
        triage_success_rate: triageSummary.success_rate,
        deduplicated_commands: triageSkipped + sumOf(phases, (p) => p.summary.skipped_duplicates),
        unique_commands_executed: ledger.size,
        evidence_directory: executor.layout.root,
        detailed_log_file: detailedLog,
      },
      execution_status: statusFromSuccessRate(rate, totalCommands),
    };

    await writeJSON(path.join(executor.layout.logsDir, `run_result_${fileTimestamp(executionEnd)}.json`), run);
    this.log.info("Run finished", {
      case_id: caseId,
      status: run.execution_status,
      total_commands: totalCommands,
      deduplicated: run.summary.deduplicated_commands,
    });
    return run;
  }

  private async runStep(
    step: PlanStep,
    category: CategoryHint,
    baseContext: ExecutionContext,
    executor: CommandExecutor,
    ledger: DeduplicationLedger
  ): Promise<StepOutcome> {
    const results: CommandResult[] = [];
    let skipped = 0;

    for (const command of step.commands) {
      const context: ExecutionContext = { ...baseContext, step: step.name, category };
      const hit = ledger.lookup(command);
      if (hit) {
        const reused = reusedResult(command, hit, this.now().toISOString());
        await executor.recordReuse(reused, context);
        this.log.info("Reusing earlier result", { command, status: hit.status });
        results.push(reused);
        skipped++;
        continue;
      }
      const result = await executor.execute({ command, context, category });
      ledger.record(command, { status: result.status, output_file: result.output_file });
      results.push(result);
    }

    const hits = applyHeuristics(step.suspicion_heuristics, results, this.now().toISOString());
    for (const hit of hits) {
      this.log.warn("Suspicious output", { step: step.name, command: hit.command, heuristic: hit.heuristic });
    }

    const successful = results.filter((r) => r.status === "success").length;
    return {
      step: {
        step_name: step.name,
        parse_expectations: step.parse_expectations || null,
        commands_executed: results.length,
        successful_commands: successful,
        suspicious_hits: hits.length,
        success_rate: successRate(successful, results.length),
        results: results.map(summarizeResult),
        hits,
      },
      skipped,
    };
  }
}

function sumOf<T>(items: readonly T[], pick: (item: T) => number): number {
  return items.reduce((sum, item) => sum + pick(item), 0);
}
