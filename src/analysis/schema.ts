import { z } from "zod";

export const SuspiciousFindingSchema = z.object({
  finding_type: z.string().default("unknown"),
  description: z.string().default(""),
  severity: z.string().default("medium"),
  evidence: z.string().default(""),
  score: z.coerce.number().default(0),
});

export const AnalysisResultSchema = z.object({
  suspicious_findings: z.array(SuspiciousFindingSchema).default([]),
  threat_score: z.coerce.number().min(0).max(10).default(0),
  key_indicators: z.array(z.string()).default([]),
  recommended_actions: z.array(z.string()).default([]),
  executive_summary: z.string().default(""),
  analysis_confidence: z.coerce.number().min(0).max(1).default(0),
});

export const ChunkResultSchema = AnalysisResultSchema.extend({
  chunk_id: z.string(),
  timestamp: z.string(),
});

export const ChunkMetadataSchema = z.object({
  timestamp: z.string(),
  chunks_directory: z.string(),
  total_chunks: z.number().int().nonnegative(),
  source: z.record(z.string()),
  chunk_files: z.array(
    z.object({
      chunk_id: z.string(),
      file_path: z.string(),
      token_count: z.number(),
      character_count: z.number(),
    })
  ),
});
