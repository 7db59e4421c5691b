import * as path from "node:path";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { readChunkMetadata, loadExistingResults } from "../analysis/chunker.js";
import { gatherAnalysisContext, loadLatestRunDigest } from "../analysis/context.js";
import { runChunkedAnalysis, saveAnalysisResult, type ChunkedAnalysisReport } from "../analysis/chunkedAnalysis.js";
import { createTokenCounter, type TokenCounter } from "../analysis/tokens.js";
import type { InvestigationAgents } from "../llm/agents.js";
import { EvidenceLayout } from "../storage/index.js";
import type { ForensicsConfig } from "../config.js";

export interface ChunkStatus {
  evidence_directory: string;
  chunks_directory: string;
  total_chunks: number;
  completed: string[];
  pending: string[];
  created_at: string | null;
}

export async function chunkStatus(evidenceDir: string): Promise<ChunkStatus> {
  const layout = new EvidenceLayout(evidenceDir);
  const metadata = await readChunkMetadata(layout.chunksDir);
  const done = await loadExistingResults(layout.chunksDir);
  const ids = metadata?.chunk_files.map((f) => f.chunk_id) ?? [];
  return {
    evidence_directory: layout.root,
    chunks_directory: layout.chunksDir,
    total_chunks: metadata?.total_chunks ?? 0,
    completed: ids.filter((id) => done.has(id)),
    pending: ids.filter((id) => !done.has(id)),
    created_at: metadata?.timestamp ?? null,
  };
}

export interface AnalyzeEvidenceOptions {
  config: ForensicsConfig;
  agents: InvestigationAgents;
  countTokens?: TokenCounter;
}

export interface AnalyzeEvidenceResult {
  report: ChunkedAnalysisReport;
  analysis_file: string;
}

/** Gather, analyze (resuming any chunk work on disk) and save. */
export async function analyzeEvidence(evidenceDir: string, options: AnalyzeEvidenceOptions): Promise<AnalyzeEvidenceResult> {
  const root = path.resolve(evidenceDir);
  const { config } = options;
  const digest = await loadLatestRunDigest(root);
  const context = await gatherAnalysisContext(digest, root);
  const report = await runChunkedAnalysis(context, (text, chunk) => options.agents.analyze(text, chunk), {
    evidenceDir: root,
    maxChunkTokens: config.maxChunkTokens,
    concurrency: config.chunkConcurrency,
    countTokens: options.countTokens ?? createTokenCounter(config.analyzerModel),
    retry: {
      maxRetries: config.maxRetries,
      baseDelaySeconds: config.rateLimitDelay,
      maxDelaySeconds: config.maxRateLimitDelay,
    },
    source: { evidence_directory: root },
  });
  const analysisFile = await saveAnalysisResult(report.result, root, report.mode === "single" ? "single" : "combined", {
    total_chunks: report.total_chunks,
  });
  return { report, analysis_file: analysisFile };
}

export function registerChunkTools(server: McpServer): void {
  server.tool(
    "chunks_status",
    "Show chunk metadata for a run directory and which chunks already have results",
    {
      evidence_dir: z.string().describe("Run directory containing analysis_chunks/"),
    },
    async (args) => {
      const result = await chunkStatus(args.evidence_dir);
      return {
        content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
      };
    }
  );
}
