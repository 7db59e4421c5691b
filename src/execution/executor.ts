import * as fs from "node:fs/promises";
import * as path from "node:path";
import { createHash } from "node:crypto";
import { ValidatedCommand } from "./safety.js";
import { ChildProcessRunner, type ProcessRunner } from "./runner.js";
import { EvidenceLayout, fileTimestamp, appendJSONLine, ensureDir, writeJSON, isErrnoException } from "../storage/index.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import type {
  CategoryHint,
  CommandResult,
  CommandSummary,
  EvidenceCategory,
  ExecutionContext,
  ExecutionLogEntry,
  ExecutionStatus,
} from "../types.js";

export interface ExecutorOptions {
  /** Per-command wall-clock bound in seconds. */
  timeoutSeconds?: number;
  /** Binary substituted for the launcher token at spawn time. */
  volatilityPath?: string;
  runner?: ProcessRunner;
  logger?: Logger;
  now?: () => Date;
}

export interface ExecuteParams {
  command: string;
  context?: ExecutionContext;
  saveOutput?: boolean;
  category?: CategoryHint;
}

export interface ExecutionSummaryFile {
  execution_start: string | null;
  execution_end: string;
  total_commands: number;
  successful_commands: number;
  failed_commands: number;
  timeout_commands: number;
  reused_commands: number;
  total_execution_time: number;
  evidence_directories: Record<EvidenceCategory, string>;
  detailed_log: ExecutionLogEntry[];
}

const HEADER_SEPARATOR = "=".repeat(60);

export function sha256(content: string): string {
  return createHash("sha256").update(content, "utf8").digest("hex");
}

/** Keeps alphanumerics and `._-` from the command's last token. */
export function outputFileStem(command: string): string {
  const parts = command.trim().split(/\s+/);
  const last = parts[parts.length - 1] ?? "";
  const safe = Array.from(last).filter((c) => /[A-Za-z0-9._-]/.test(c)).join("");
  return safe || "unknown";
}

export function summarizeResult(result: CommandResult): CommandSummary {
  return {
    command: result.command,
    status: result.status,
    exit_code: result.exit_code,
    execution_time: result.execution_time,
    timestamp: result.timestamp,
    output_file: result.output_file,
    content_hash: result.content_hash,
    error_message: result.error_message,
    output_length: result.stdout.length,
    reused: result.reused,
  };
}

export class CommandExecutor {
  readonly layout: EvidenceLayout;
  readonly timeoutSeconds: number;
  private readonly volatilityPath: string | undefined;
  private readonly runner: ProcessRunner;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly executionLog: ExecutionLogEntry[] = [];
  private layoutReady: Promise<void> | null = null;

  constructor(evidenceRoot: string, options: ExecutorOptions = {}) {
    this.layout = new EvidenceLayout(evidenceRoot);
    this.timeoutSeconds = options.timeoutSeconds ?? 600;
    this.volatilityPath = options.volatilityPath;
    this.runner = options.runner ?? new ChildProcessRunner();
    this.log = (options.logger ?? rootLogger).child({ component: "executor" });
    this.now = options.now ?? (() => new Date());
  }

  get entries(): readonly ExecutionLogEntry[] {
    return this.executionLog;
  }

  /** Creates the evidence tree once; a failure here is unrecoverable for the run. */
  async prepare(): Promise<void> {
    if (!this.layoutReady) {
      this.layoutReady = this.layout.create().catch((err: unknown) => {
        this.layoutReady = null;
        const reason = err instanceof Error ? err.message : String(err);
        throw Object.assign(new Error(`Evidence directory ${this.layout.root} is not writable: ${reason}`), {
          code: "evidence_dir_unwritable",
          cause: err,
        });
      });
    }
    await this.layoutReady;
  }

  async execute(params: ExecuteParams): Promise<CommandResult> {
    const { command, context, saveOutput = true, category = "general" } = params;
    const startedAt = this.now();
    const timestamp = startedAt.toISOString();

    const verdict = ValidatedCommand.from(command);
    if (!verdict.safe) {
      this.log.warn("Command rejected", { command, kind: verdict.kind, reason: verdict.reason });
      const label = verdict.kind === "parse_failure" ? "Command parsing failed" : "Command failed security validation";
      const result = this.buildResult(command, timestamp, {
        status: "failed",
        stderr: verdict.reason,
        exit_code: -1,
        error_message: `${label}: ${verdict.reason}`,
      });
      await this.record(result, context);
      return result;
    }

    await this.prepare();

    const argv = [...verdict.command.argv];
    if (this.volatilityPath) {
      argv[0] = this.volatilityPath;
    }

    this.log.info("Executing command", { command });
    const started = performance.now();
    const outcome = await this.runner.run(argv, this.timeoutSeconds * 1000);
    const executionTime = (performance.now() - started) / 1000;

    let result: CommandResult;
    if (outcome.timedOut) {
      result = this.buildResult(command, timestamp, {
        status: "timeout",
        stderr: outcome.stderr || `Command timed out after ${this.timeoutSeconds} seconds`,
        exit_code: -1,
        execution_time: executionTime,
        error_message: `Timeout after ${this.timeoutSeconds}s`,
      });
      this.log.warn("Command timed out", { command, timeout_s: this.timeoutSeconds });
    } else if (outcome.error !== null) {
      result = this.buildResult(command, timestamp, {
        status: "failed",
        stdout: outcome.stdout,
        stderr: outcome.stderr || outcome.error,
        exit_code: outcome.exitCode,
        execution_time: executionTime,
        error_message: `Exception: ${outcome.error}`,
      });
      this.log.error("Command could not run", { command, error: outcome.error });
    } else {
      const status: ExecutionStatus = outcome.exitCode === 0 ? "success" : "failed";
      let outputFile: string | null = null;
      let contentHash: string | null = null;
      if (saveOutput && outcome.stdout.trim()) {
        outputFile = await this.saveOutput(command, outcome.stdout, category, startedAt);
        contentHash = sha256(outcome.stdout);
      }
      result = this.buildResult(command, timestamp, {
        status,
        stdout: outcome.stdout,
        stderr: outcome.stderr,
        exit_code: outcome.exitCode,
        execution_time: executionTime,
        content_hash: contentHash,
        output_file: outputFile,
        error_message: status === "success" ? null : `Command exited with code ${outcome.exitCode}`,
      });
      this.log.info("Command finished", { command, status, seconds: Number(executionTime.toFixed(2)) });
    }

    await this.record(result, context);
    return result;
  }

  /** Log a ledger hit so the execution log covers every occurrence. */
  async recordReuse(result: CommandResult, context?: ExecutionContext): Promise<void> {
    await this.record(result, context);
  }

  async saveExecutionSummary(): Promise<string> {
    await this.prepare();
    const end = this.now();
    const executed = this.executionLog.filter((e) => !e.reused);
    const summary: ExecutionSummaryFile = {
      execution_start: this.executionLog[0]?.timestamp ?? null,
      execution_end: end.toISOString(),
      total_commands: executed.length,
      successful_commands: executed.filter((e) => e.status === "success").length,
      failed_commands: executed.filter((e) => e.status === "failed").length,
      timeout_commands: executed.filter((e) => e.status === "timeout").length,
      reused_commands: this.executionLog.length - executed.length,
      total_execution_time: executed.reduce((sum, e) => sum + e.execution_time, 0),
      evidence_directories: this.layout.directories(),
      detailed_log: [...this.executionLog],
    };
    const file = path.join(this.layout.logsDir, `execution_summary_${fileTimestamp(end)}.json`);
    await writeJSON(file, summary);
    return file;
  }

  private buildResult(
    command: string,
    timestamp: string,
    fields: Partial<CommandResult> & Pick<CommandResult, "status" | "exit_code">
  ): CommandResult {
    return {
      command,
      timestamp,
      stdout: "",
      stderr: "",
      execution_time: 0,
      content_hash: null,
      output_file: null,
      error_message: null,
      reused: false,
      ...fields,
    };
  }

  private async saveOutput(command: string, stdout: string, category: CategoryHint, at: Date): Promise<string> {
    const dir = this.layout.dirFor(category);
    await ensureDir(dir);
    const base = `${fileTimestamp(at)}_${outputFileStem(command)}`;
    const content = `Command: ${command}\nTimestamp: ${at.toISOString()}\n${HEADER_SEPARATOR}\n${stdout}`;

    // Same second + same last token: suffix instead of overwriting earlier evidence.
    for (let n = 1; ; n++) {
      const file = path.join(dir, n === 1 ? `${base}.txt` : `${base}_${n}.txt`);
      try {
        await fs.writeFile(file, content, { encoding: "utf-8", flag: "wx" });
        return file;
      } catch (err: unknown) {
        if (isErrnoException(err) && err.code === "EEXIST") continue;
        throw err;
      }
    }
  }

  private async record(result: CommandResult, context: ExecutionContext | undefined): Promise<void> {
    const entry: ExecutionLogEntry = {
      timestamp: result.timestamp,
      command: result.command,
      status: result.status,
      execution_time: result.execution_time,
      exit_code: result.exit_code,
      output_file: result.output_file,
      reused: result.reused,
      context: context ?? null,
    };
    this.executionLog.push(entry);
    await this.prepare();
    await appendJSONLine(this.layout.executionLogPath, entry);
  }
}
