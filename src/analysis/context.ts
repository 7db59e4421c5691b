import * as fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { CHUNKS_SUBDIR, DEEPER_SUBDIR, RESULTS_SUBDIR, EVIDENCE_SUBDIRS, isErrnoException, readJSON } from "../storage/index.js";

/** The parts of a RunResult the analysis context reads. */
export interface RunDigest {
  global_triage: Array<{ step_name: string; successful_commands: number; commands_executed: number }>;
  phases: Array<{ phase_name: string; summary: { success_rate: number; total_hits: number } }>;
}

const RunDigestSchema = z.object({
  global_triage: z.array(
    z.object({ step_name: z.string(), successful_commands: z.number(), commands_executed: z.number() })
  ),
  phases: z.array(
    z.object({ phase_name: z.string(), summary: z.object({ success_rate: z.number(), total_hits: z.number() }) })
  ),
});

const SKIPPED_DIRS = new Set([CHUNKS_SUBDIR, DEEPER_SUBDIR, RESULTS_SUBDIR]);

// <YYYYMMDD>_<HHMMSS>_<plugin>[_<n>].txt
const EVIDENCE_NAME = /^\d{8}_\d{6}_(.+?)(?:_\d+)?\.txt$/;

export function pluginKey(fileName: string): string {
  const match = EVIDENCE_NAME.exec(fileName);
  return match?.[1] ?? path.basename(fileName, ".txt");
}

async function listTextFiles(dir: string, skipTopLevel: boolean): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === "ENOENT") return [];
    throw err;
  }
  const files: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (skipTopLevel && SKIPPED_DIRS.has(entry.name)) continue;
      files.push(...(await listTextFiles(full, false)));
    } else if (entry.isFile() && entry.name.endsWith(".txt")) {
      files.push(full);
    }
  }
  return files;
}

/** Newest `logs/run_result_*.json` of a run directory, if any. */
export async function loadLatestRunDigest(evidenceDir: string): Promise<RunDigest | null> {
  const logsDir = path.join(evidenceDir, EVIDENCE_SUBDIRS.logs);
  let names: string[];
  try {
    names = await fs.readdir(logsDir);
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === "ENOENT") return null;
    throw err;
  }
  const latest = names.filter((n) => /^run_result_.*\.json$/.test(n)).sort().pop();
  if (!latest) return null;
  return readJSON(path.join(logsDir, latest), RunDigestSchema.nullable(), null);
}

/**
 * Text handed to the analyzer: triage and phase summaries followed by the
 * evidence files, one per plugin, in path order.
 */
export async function gatherAnalysisContext(run: RunDigest | null, evidenceDir: string): Promise<string> {
  const parts: string[] = [];

  if (run) {
    parts.push("GLOBAL TRIAGE RESULTS:");
    for (const step of run.global_triage) {
      parts.push(`- ${step.step_name}: ${step.successful_commands}/${step.commands_executed} commands successful`);
    }
    parts.push("", "PHASE RESULTS:");
    for (const phase of run.phases) {
      const pct = (phase.summary.success_rate * 100).toFixed(1);
      parts.push(`- ${phase.phase_name}: ${pct}% success, ${phase.summary.total_hits} suspicious hits`);
    }
    parts.push("");
  }

  const files = (await listTextFiles(evidenceDir, true)).sort();
  const seen = new Set<string>();
  for (const file of files) {
    const key = pluginKey(path.basename(file));
    if (seen.has(key)) continue;
    seen.add(key);
    const content = await fs.readFile(file, "utf-8");
    parts.push(`=== EVIDENCE: ${path.relative(evidenceDir, file)} ===`, content, "");
  }

  return parts.join("\n");
}
