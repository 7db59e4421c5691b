import { compareChunkIds } from "./chunker.js";
import type { AnalysisResult, ChunkResult } from "../types.js";

export const ALL_CHUNKS_FAILED_ACTION = "Analysis failed for all chunks - review the evidence files manually";

/** Result reported when no analysis produced anything usable. */
export function analysisFailure(summary: string, action: string = ALL_CHUNKS_FAILED_ACTION): AnalysisResult {
  return {
    suspicious_findings: [],
    threat_score: 0,
    key_indicators: [],
    recommended_actions: [action],
    executive_summary: summary,
    analysis_confidence: 0,
  };
}

function mean(values: readonly number[]): number {
  return values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;
}

function unique(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

/**
 * Merges per-chunk results in chunk-id order, whatever order they finished in.
 * Findings are concatenated as-is; indicators and actions are de-duplicated.
 */
export function combineChunkResults(results: readonly ChunkResult[]): AnalysisResult {
  if (results.length === 0) {
    return analysisFailure("No chunk produced a usable analysis result");
  }

  const ordered = [...results].sort((a, b) => compareChunkIds(a.chunk_id, b.chunk_id));
  const findings = ordered.flatMap((r) => r.suspicious_findings);

  return {
    suspicious_findings: findings,
    threat_score: mean(ordered.map((r) => r.threat_score)),
    key_indicators: unique(ordered.flatMap((r) => r.key_indicators)),
    recommended_actions: unique(ordered.flatMap((r) => r.recommended_actions)),
    executive_summary: `Combined analysis of ${ordered.length} chunks identified ${findings.length} findings`,
    analysis_confidence: mean(ordered.map((r) => r.analysis_confidence)),
  };
}
