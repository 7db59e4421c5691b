import * as path from "node:path";
import { z } from "zod";
import { readJSON, writeJSON, withLock } from "./engine.js";
import type { IndexEntry } from "../types.js";

const STAGES = ["planning", "validating", "evaluating", "executing", "triaging", "deeper_analysis", "done"] as const;
const OUTCOMES = ["completed", "partial", "failed", "skipped"] as const;

const IndexEntrySchema = z.object({
  id: z.string(),
  dump_path: z.string(),
  os_hint: z.string(),
  evidence_directory: z.string().nullable(),
  stage: z.enum(STAGES),
  outcome: z.enum(OUTCOMES).nullable(),
  threat_score: z.number().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

const IndexSchema = z.array(IndexEntrySchema);

export function resolveDataDir(): string {
  return process.env.FORENSICS_EVIDENCE_DIR || path.resolve("forensics_evidence");
}

function indexPath(dataDir: string): string {
  return path.join(dataDir, "index.json");
}

function lockPath(dataDir: string): string {
  return path.join(dataDir, ".memprobe.lock");
}

// ── Index management ──

export async function getIndex(dataDir: string = resolveDataDir()): Promise<IndexEntry[]> {
  return readJSON(indexPath(dataDir), IndexSchema, []);
}

export async function updateIndexEntry(entry: IndexEntry, dataDir: string = resolveDataDir()): Promise<void> {
  await withLock(lockPath(dataDir), async () => {
    const index = await getIndex(dataDir);
    const existing = index.findIndex((e) => e.id === entry.id);
    if (existing >= 0) {
      index[existing] = entry;
    } else {
      index.push(entry);
    }
    await writeJSON(indexPath(dataDir), index);
  });
}

/** Newest first. */
export async function listInvestigations(dataDir: string = resolveDataDir()): Promise<IndexEntry[]> {
  const index = await getIndex(dataDir);
  return [...index].sort((a, b) => b.updated_at.localeCompare(a.updated_at));
}
