import * as path from "node:path";
import pLimit from "p-limit";
import { splitText, persistChunks, loadExistingResults, chunkResultFile, compareChunkIds } from "./chunker.js";
import { combineChunkResults, analysisFailure } from "./combiner.js";
import { withRateLimitRetry, type RetryPolicy } from "./backoff.js";
import type { TokenCounter } from "./tokens.js";
import { describeLlmError, type ChunkInfo, type LlmResult } from "../llm/agents.js";
import { EvidenceLayout, fileTimestamp, writeJSON } from "../storage/index.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import type { AnalysisResult, AnalysisType, ChunkFileInfo, ChunkMetadata, ChunkResult, FailedChunk } from "../types.js";

export type ChunkAnalyzer = (text: string, chunk: ChunkInfo | null) => Promise<LlmResult<AnalysisResult>>;

export interface ChunkedAnalysisOptions {
  /** Run root; chunks go to `analysis_chunks/`, reports to `analysis_results/`. */
  evidenceDir: string;
  maxChunkTokens: number;
  concurrency: number;
  countTokens: TokenCounter;
  retry: RetryPolicy;
  source?: Record<string, string>;
  logger?: Logger;
  now?: () => Date;
}

export interface ChunkedAnalysisReport {
  mode: "single" | "chunked";
  result: AnalysisResult;
  total_tokens: number;
  total_chunks: number;
  analyzed_chunks: string[];
  reused_chunks: string[];
  failed_chunks: FailedChunk[];
  metadata_file: string | null;
}

async function callAnalyzer(analyzer: ChunkAnalyzer, text: string, chunk: ChunkInfo | null): Promise<LlmResult<AnalysisResult>> {
  try {
    return await analyzer(text, chunk);
  } catch (err: unknown) {
    return { ok: false, error: { kind: "other", message: err instanceof Error ? err.message : String(err) } };
  }
}

export async function runChunkedAnalysis(
  context: string,
  analyzer: ChunkAnalyzer,
  options: ChunkedAnalysisOptions
): Promise<ChunkedAnalysisReport> {
  const log = (options.logger ?? rootLogger).child({ component: "chunked-analysis" });
  const now = options.now ?? (() => new Date());
  const layout = new EvidenceLayout(options.evidenceDir);
  const retry: RetryPolicy = { logger: log, ...options.retry };
  const totalTokens = options.countTokens(context);

  if (totalTokens <= options.maxChunkTokens) {
    log.info("Single analysis", { tokens: totalTokens });
    const outcome = await withRateLimitRetry(() => callAnalyzer(analyzer, context, null), retry);
    if (outcome.ok) {
      return { mode: "single", result: outcome.value, total_tokens: totalTokens, total_chunks: 1, analyzed_chunks: ["single"], reused_chunks: [], failed_chunks: [], metadata_file: null };
    }
    const error = describeLlmError(outcome.error);
    log.error("Analysis failed", { error });
    return {
      mode: "single",
      result: analysisFailure(`Analysis failed: ${error}`, "Retry the analysis once the model is reachable"),
      total_tokens: totalTokens,
      total_chunks: 1,
      analyzed_chunks: [],
      reused_chunks: [],
      failed_chunks: [{ chunk_id: "single", error }],
      metadata_file: null,
    };
  }

  const chunks = splitText(context, options.maxChunkTokens, options.countTokens);
  const metadata = await persistChunks(chunks, layout.chunksDir, options.countTokens, options.source, now());
  const existing = await loadExistingResults(layout.chunksDir);
  // Result files left by an earlier, longer split are not part of this one
  const reused: ChunkResult[] = [];
  const pending: ChunkFileInfo[] = [];
  for (const file of metadata.chunk_files) {
    const stored = existing.get(file.chunk_id);
    if (stored) reused.push(stored);
    else pending.push(file);
  }
  log.info("Chunked analysis", {
    tokens: totalTokens,
    chunks: chunks.length,
    already_done: chunks.length - pending.length,
    concurrency: options.concurrency,
  });

  const limit = pLimit(options.concurrency);
  const fresh: ChunkResult[] = [];
  const failed: FailedChunk[] = [];

  await Promise.all(
    pending.map((file) =>
      limit(async () => {
        const index = metadata.chunk_files.indexOf(file);
        const text = chunks[index] ?? "";
        const info: ChunkInfo = { chunkId: file.chunk_id, index, total: chunks.length };
        const outcome = await withRateLimitRetry(() => callAnalyzer(analyzer, text, info), retry);
        if (!outcome.ok) {
          const error = describeLlmError(outcome.error);
          log.error("Chunk analysis failed", { chunk_id: file.chunk_id, error });
          failed.push({ chunk_id: file.chunk_id, error });
          return;
        }
        const result: ChunkResult = { ...outcome.value, chunk_id: file.chunk_id, timestamp: now().toISOString() };
        await writeJSON(chunkResultFile(layout.chunksDir, file.chunk_id), result);
        fresh.push(result);
        log.info("Chunk analyzed", { chunk_id: file.chunk_id, threat_score: result.threat_score });
      })
    )
  );

  const combined = combineChunkResults([...reused, ...fresh]);
  failed.sort((a, b) => compareChunkIds(a.chunk_id, b.chunk_id));
  const analyzed = fresh.map((r) => r.chunk_id).sort(compareChunkIds);
  const reusedIds = reused.map((r) => r.chunk_id);
  const metadataFile = await saveChunkedAnalysisMetadata(layout, metadata, {
    analyzed,
    reused: reusedIds,
    failed,
    combined,
    at: now(),
  });

  return {
    mode: "chunked",
    result: combined,
    total_tokens: totalTokens,
    total_chunks: chunks.length,
    analyzed_chunks: analyzed,
    reused_chunks: reusedIds,
    failed_chunks: failed,
    metadata_file: metadataFile,
  };
}

async function saveChunkedAnalysisMetadata(
  layout: EvidenceLayout,
  chunkMetadata: ChunkMetadata,
  outcome: { analyzed: string[]; reused: string[]; failed: FailedChunk[]; combined: AnalysisResult; at: Date }
): Promise<string> {
  const file = path.join(layout.resultsDir, `chunked_analysis_metadata_${fileTimestamp(outcome.at)}.json`);
  await writeJSON(file, {
    timestamp: outcome.at.toISOString(),
    total_chunks: chunkMetadata.total_chunks,
    analyzed_chunks: outcome.analyzed,
    reused_chunks: outcome.reused,
    failed_chunks: outcome.failed,
    combined_threat_score: outcome.combined.threat_score,
    combined_confidence: outcome.combined.analysis_confidence,
    chunk_metadata: chunkMetadata,
  });
  return file;
}

/** Writes `analysis_results/<type>_analysis_<ts>.json` under the run root. */
export async function saveAnalysisResult(
  result: AnalysisResult,
  evidenceDir: string,
  type: AnalysisType,
  context: Record<string, unknown> = {},
  at: Date = new Date()
): Promise<string> {
  const layout = new EvidenceLayout(evidenceDir);
  const file = path.join(layout.resultsDir, `${type}_analysis_${fileTimestamp(at)}.json`);
  await writeJSON(file, {
    analysis_type: type,
    timestamp: at.toISOString(),
    ...context,
    threat_score: result.threat_score,
    analysis_confidence: result.analysis_confidence,
    executive_summary: result.executive_summary,
    suspicious_findings: result.suspicious_findings,
    key_indicators: result.key_indicators,
    recommended_actions: result.recommended_actions,
  });
  return file;
}
