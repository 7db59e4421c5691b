import * as path from "node:path";
import { ensureDir } from "./engine.js";
import type { CategoryHint, EvidenceCategory } from "../types.js";

export const EVIDENCE_SUBDIRS: Record<EvidenceCategory, string> = {
  triage: "01_triage",
  processes: "02_processes",
  network: "03_network",
  persistence: "04_persistence",
  memory: "05_memory",
  timeline: "06_timeline",
  iocs: "07_iocs",
  logs: "logs",
};

export const CHUNKS_SUBDIR = "analysis_chunks";
export const RESULTS_SUBDIR = "analysis_results";
export const DEEPER_SUBDIR = "deeper_analysis";

// First match wins; order matters for names like "Process Memory Injection".
const PHASE_CATEGORY_RULES: Array<{ keywords: string[]; category: EvidenceCategory }> = [
  { keywords: ["triage", "initial"], category: "triage" },
  { keywords: ["process"], category: "processes" },
  { keywords: ["network"], category: "network" },
  { keywords: ["persistence"], category: "persistence" },
  { keywords: ["memory", "inject"], category: "memory" },
  { keywords: ["timeline"], category: "timeline" },
];

export function categoryForPhase(phaseName: string): CategoryHint {
  const lower = phaseName.toLowerCase();
  const rule = PHASE_CATEGORY_RULES.find((r) => r.keywords.some((k) => lower.includes(k)));
  return rule ? rule.category : "general";
}

export class EvidenceLayout {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  dirFor(category: CategoryHint): string {
    const sub = category === "general" ? EVIDENCE_SUBDIRS.logs : EVIDENCE_SUBDIRS[category];
    return path.join(this.root, sub);
  }

  get logsDir(): string {
    return path.join(this.root, EVIDENCE_SUBDIRS.logs);
  }

  get chunksDir(): string {
    return path.join(this.root, CHUNKS_SUBDIR);
  }

  get resultsDir(): string {
    return path.join(this.root, RESULTS_SUBDIR);
  }

  get deeperRoot(): string {
    return path.join(this.root, DEEPER_SUBDIR);
  }

  get executionLogPath(): string {
    return path.join(this.logsDir, "execution_log.jsonl");
  }

  directories(): Record<EvidenceCategory, string> {
    const at = (category: EvidenceCategory) => path.join(this.root, EVIDENCE_SUBDIRS[category]);
    return {
      triage: at("triage"),
      processes: at("processes"),
      network: at("network"),
      persistence: at("persistence"),
      memory: at("memory"),
      timeline: at("timeline"),
      iocs: at("iocs"),
      logs: at("logs"),
    };
  }

  /** Creates the fixed category tree. Chunk and result directories are created on first write. */
  async create(): Promise<void> {
    for (const dir of Object.values(this.directories())) {
      await ensureDir(dir);
    }
  }
}

/** `20261019_070105` style stamp, UTC. */
export function fileTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
}

export function caseIdFromDumpPath(dumpPath: string): string {
  const base = path.basename(dumpPath).replace(/\.(raw|mem|vmem|dmp|lime)$/i, "");
  return base.replace(/[^A-Za-z0-9._-]/g, "_") || "unknown_case";
}

export function runDirectoryName(dumpPath: string, date: Date = new Date()): string {
  return `${caseIdFromDumpPath(dumpPath)}_${fileTimestamp(date)}`;
}
