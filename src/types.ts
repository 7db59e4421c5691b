// ── Command execution types ──

export type ExecutionStatus = "success" | "failed" | "timeout" | "skipped" | "partial";

export type EvidenceCategory =
  | "triage"
  | "processes"
  | "network"
  | "persistence"
  | "memory"
  | "timeline"
  | "iocs"
  | "logs";

/** Category names accepted by the executor; anything unmapped lands in logs/. */
export type CategoryHint = EvidenceCategory | "general";

export interface CommandResult {
  readonly command: string;
  readonly status: ExecutionStatus;
  readonly stdout: string;
  readonly stderr: string;
  readonly exit_code: number;
  /** Seconds. Zero for rejected and reused commands. */
  readonly execution_time: number;
  readonly timestamp: string;
  readonly content_hash: string | null;
  readonly output_file: string | null;
  readonly error_message: string | null;
  readonly reused: boolean;
}

export type ExecutionContext = Record<string, unknown>;

export interface ExecutionLogEntry {
  timestamp: string;
  command: string;
  status: ExecutionStatus;
  execution_time: number;
  exit_code: number;
  output_file: string | null;
  reused: boolean;
  context: ExecutionContext | null;
}

export interface LedgerEntry {
  status: ExecutionStatus;
  output_file: string | null;
}

// ── Plan execution results ──

export interface CommandSummary {
  command: string;
  status: ExecutionStatus;
  exit_code: number;
  execution_time: number;
  timestamp: string;
  output_file: string | null;
  content_hash: string | null;
  error_message: string | null;
  output_length: number;
  reused: boolean;
}

export interface HeuristicHit {
  command: string;
  heuristic: string;
  timestamp: string;
  evidence_file: string | null;
}

export interface StepResult {
  step_name: string;
  parse_expectations: string | null;
  commands_executed: number;
  successful_commands: number;
  suspicious_hits: number;
  success_rate: number;
  results: CommandSummary[];
  hits: HeuristicHit[];
}

export interface PhaseSummary {
  execution_time: number;
  total_commands: number;
  successful_commands: number;
  success_rate: number;
  total_hits: number;
  skipped_duplicates: number;
  end_time: string;
}

export interface PhaseResult {
  phase_name: string;
  category: CategoryHint;
  start_time: string;
  steps: StepResult[];
  summary: PhaseSummary;
}

export interface TriageSummary {
  total_commands: number;
  successful_commands: number;
  skipped_duplicates: number;
  success_rate: number;
}

export type RunStatus = "completed" | "partial" | "failed";

export interface RunSummary {
  total_commands: number;
  successful_commands: number;
  success_rate: number;
  total_suspicious_hits: number;
  triage_success_rate: number;
  deduplicated_commands: number;
  unique_commands_executed: number;
  evidence_directory: string;
  detailed_log_file: string | null;
}

export interface RunResult {
  plan_version: string;
  case_id: string;
  evidence_directory: string;
  execution_start: string;
  execution_end: string;
  global_triage: StepResult[];
  triage_summary: TriageSummary;
  phases: PhaseResult[];
  summary: RunSummary;
  execution_status: RunStatus;
}

// ── Analysis types ──

export interface SuspiciousFinding {
  finding_type: string;
  description: string;
  severity: string;
  evidence: string;
  score: number;
}

export interface AnalysisResult {
  suspicious_findings: SuspiciousFinding[];
  threat_score: number;
  key_indicators: string[];
  recommended_actions: string[];
  executive_summary: string;
  analysis_confidence: number;
}

export interface ChunkResult extends AnalysisResult {
  chunk_id: string;
  timestamp: string;
}

export interface ChunkFileInfo {
  chunk_id: string;
  file_path: string;
  token_count: number;
  character_count: number;
}

export interface ChunkMetadata {
  timestamp: string;
  chunks_directory: string;
  total_chunks: number;
  source: Record<string, string>;
  chunk_files: ChunkFileInfo[];
}

export interface FailedChunk {
  chunk_id: string;
  error: string;
}

export type AnalysisType = "single" | "combined" | "deeper";

// ── Investigation state ──

export type InvestigationStage =
  | "planning"
  | "validating"
  | "evaluating"
  | "executing"
  | "triaging"
  | "deeper_analysis"
  | "done";

export type InvestigationOutcome = "completed" | "partial" | "failed" | "skipped";

// ── Global index ──

export interface IndexEntry {
  id: string;
  dump_path: string;
  os_hint: string;
  evidence_directory: string | null;
  stage: InvestigationStage;
  outcome: InvestigationOutcome | null;
  threat_score: number | null;
  created_at: string;
  updated_at: string;
}
