#!/usr/bin/env node

import "dotenv/config";
import { Command } from "commander";
import { startMcpServer } from "./serve.js";
import { checkCommand } from "./tools/commands.js";
import { validatePlanFile, executePlanFile } from "./tools/plans.js";
import { chunkStatus, analyzeEvidence } from "./tools/chunks.js";
import { listInvestigationEntries } from "./tools/investigations.js";
import { Investigation } from "./investigation/stateMachine.js";
import { OpenAIAgents } from "./llm/openaiAgents.js";
import { loadConfig, type ForensicsConfig } from "./config.js";
import { logger } from "./logger.js";
import { VERSION } from "./version.js";
import type { InvestigationStage } from "./types.js";

const STAGES: InvestigationStage[] = ["planning", "validating", "evaluating", "executing", "triaging", "deeper_analysis", "done"];

function config(): ForensicsConfig {
  const cfg = loadConfig();
  logger.setLevel(cfg.logLevel);
  return cfg;
}

function pct(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

const program = new Command();

program
  .name("memprobe")
  .description("Plan-driven memory forensics: safe Volatility execution, evidence capture and chunked analysis")
  .version(VERSION);

// ── serve ──
program
  .command("serve")
  .description("Start the MCP server (stdio transport)")
  .action(async () => {
    config();
    await startMcpServer();
  });

// ── check ──
program
  .command("check")
  .description("Run a command through the safety gate without executing it")
  .argument("<command>", "Command string, quoted")
  .action((command: string) => {
    const result = checkCommand(command);
    if (result.safe) {
      console.log(`SAFE | plugin: ${result.plugin ?? "-"} | argv: ${JSON.stringify(result.argv)}`);
    } else {
      console.log(`REJECTED (${result.kind}) | ${result.reason}`);
      process.exitCode = 1;
    }
  });

// ── validate ──
program
  .command("validate")
  .description("Validate a plan file against the full plan schema")
  .argument("<plan>", "Plan JSON file")
  .action(async (file: string) => {
    const report = await validatePlanFile(file);
    if (!report.valid) {
      console.log(`INVALID: ${report.file}`);
      for (const issue of report.issues) console.log(`  - ${issue}`);
      process.exitCode = 1;
      return;
    }
    console.log(`VALID: ${report.file} (v${report.plan_version})`);
    console.log(`Triage steps: ${report.triage_steps} | Phases: ${report.phases} | Commands: ${report.commands}`);
    for (const warning of report.warnings) console.log(`  warning: ${warning}`);
  });

// ── execute ──
program
  .command("execute")
  .description("Execute a plan's triage steps and phases")
  .argument("<plan>", "Plan JSON file")
  .option("--evidence-dir <dir>", "Run directory (default: new directory under the evidence base)")
  .action(async (file: string, opts: { evidenceDir?: string }) => {
    const run = await executePlanFile(file, { config: config(), evidenceDir: opts.evidenceDir });
    const s = run.summary;
    console.log(`Run: ${run.case_id} | Status: ${run.execution_status}`);
    console.log(`Commands: ${s.successful_commands}/${s.total_commands} (${pct(s.success_rate)}) | Unique: ${s.unique_commands_executed} | Reused: ${s.deduplicated_commands}`);
    console.log(`Triage: ${pct(s.triage_success_rate)} | Suspicious hits: ${s.total_suspicious_hits}`);
    for (const phase of run.phases) {
      console.log(`  ${phase.phase_name} [${phase.category}]: ${phase.summary.successful_commands}/${phase.summary.total_commands}, hits ${phase.summary.total_hits}`);
    }
    console.log(`Evidence: ${s.evidence_directory}`);
  });

// ── analyze ──
program
  .command("analyze")
  .description("Analyze a run directory's evidence; resumes chunk work left on disk")
  .argument("<evidence-dir>", "Run directory")
  .action(async (dir: string) => {
    const cfg = config();
    const { report, analysis_file } = await analyzeEvidence(dir, { config: cfg, agents: new OpenAIAgents(cfg) });
    console.log(`Mode: ${report.mode} | Chunks: ${report.total_chunks} | Analyzed: ${report.analyzed_chunks.length} | Reused: ${report.reused_chunks.length} | Failed: ${report.failed_chunks.length}`);
    console.log(`Threat score: ${report.result.threat_score.toFixed(2)} | Confidence: ${report.result.analysis_confidence.toFixed(2)}`);
    console.log(report.result.executive_summary);
    console.log(`Saved: ${analysis_file}`);
  });

// ── chunks ──
program
  .command("chunks")
  .description("Show chunk progress for a run directory")
  .argument("<evidence-dir>", "Run directory")
  .action(async (dir: string) => {
    const status = await chunkStatus(dir);
    if (status.total_chunks === 0) {
      console.log("No chunks found.");
      return;
    }
    console.log(`Chunks: ${status.total_chunks} | Completed: ${status.completed.length} | Pending: ${status.pending.length}`);
    if (status.pending.length > 0) console.log(`Pending: ${status.pending.join(", ")}`);
  });

// ── investigate ──
program
  .command("investigate")
  .description("Plan, execute, analyze and escalate an investigation of a memory image")
  .argument("<dump>", "Memory image path")
  .option("--os <os>", "Operating system hint (windows, linux, macos)", "windows")
  .option("--prompt <text>", "What to look for")
  .option("--id <id>", "Investigation id (default: derived from the dump name and time)")
  .action(async (dump: string, opts: { os: string; prompt?: string; id?: string }) => {
    const cfg = config();
    const investigation = new Investigation(
      { dumpPath: dump, osHint: opts.os, userPrompt: opts.prompt, id: opts.id },
      { agents: new OpenAIAgents(cfg), config: cfg }
    );
    const state = await investigation.run();
    console.log(`Investigation: ${state.id} | Outcome: ${state.outcome ?? "unknown"} | Planning attempts: ${state.retry_count}`);
    if (state.run) {
      console.log(`Commands: ${state.run.summary.successful_commands}/${state.run.summary.total_commands} (${state.run.execution_status})`);
    }
    if (state.analysis) {
      console.log(`Threat score: ${state.analysis.threat_score.toFixed(2)} | Confidence: ${state.analysis.analysis_confidence.toFixed(2)}`);
    }
    if (state.deeper) {
      console.log(`Deeper analysis (${state.deeper.source}): ${state.deeper.commands.length} commands`);
    }
    if (state.error) console.log(`Error: ${state.error}`);
    if (state.evidence_directory) console.log(`Evidence: ${state.evidence_directory}`);
    if (state.outcome === "failed") process.exitCode = 1;
  });

// ── list ──
program
  .command("list")
  .description("List recorded investigations")
  .option("--stage <stage>", `Filter by stage (${STAGES.join(", ")})`)
  .action(async (opts: { stage?: string }) => {
    const stage = STAGES.find((s) => s === opts.stage);
    if (opts.stage && !stage) {
      throw new Error(`Unknown stage: ${opts.stage}`);
    }
    const entries = await listInvestigationEntries({ stage }, config().evidenceBaseDir);
    if (entries.length === 0) {
      console.log("No investigations found.");
      return;
    }
    for (const e of entries) {
      const score = e.threat_score === null ? "-" : e.threat_score.toFixed(1);
      console.log(`${e.id} | ${e.stage} | ${e.outcome ?? "-"} | threat ${score} | ${e.updated_at}`);
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
