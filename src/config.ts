import * as path from "node:path";
import { z } from "zod";

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export const ForensicsConfigSchema = z.object({
  maxChunkTokens: z.coerce.number().int().positive().default(20000),
  maxRetries: z.coerce.number().int().min(1).default(5),
  maxPlanRetries: z.coerce.number().int().min(1).default(3),
  rateLimitDelay: z.coerce.number().nonnegative().default(1.0),
  maxRateLimitDelay: z.coerce.number().nonnegative().default(60.0),
  chunkConcurrency: z.coerce.number().int().min(1).default(2),
  volatilityTimeout: z.coerce.number().positive().default(600),
  volatilityPath: z.string().min(1).optional(),
  threatScoreThreshold: z.coerce.number().min(0).max(10).default(7.0),
  confidenceThreshold: z.coerce.number().min(0).max(1).default(0.8),
  evidenceBaseDir: z.string().min(1).default(path.resolve("forensics_evidence")),
  plannerModel: z.string().min(1).default("gpt-4o"),
  evaluatorModel: z.string().min(1).default("gpt-4o-mini"),
  analyzerModel: z.string().min(1).default("gpt-4o"),
  llmTimeout: z.coerce.number().positive().default(120),
  llmTemperature: z.coerce.number().min(0).max(2).default(0),
  llmMaxTokens: z.coerce.number().int().positive().default(4000),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  openaiApiKey: z.string().optional(),
  openaiBaseUrl: z.string().url().optional(),
});

export type ForensicsConfig = z.infer<typeof ForensicsConfigSchema>;

const ENV_KEYS: Record<keyof ForensicsConfig, string> = {
  maxChunkTokens: "FORENSICS_MAX_CHUNK_TOKENS",
  maxRetries: "FORENSICS_MAX_RETRIES",
  maxPlanRetries: "FORENSICS_MAX_PLAN_RETRIES",
  rateLimitDelay: "FORENSICS_RATE_LIMIT_DELAY",
  maxRateLimitDelay: "FORENSICS_MAX_RATE_LIMIT_DELAY",
  chunkConcurrency: "FORENSICS_CHUNK_CONCURRENCY",
  volatilityTimeout: "FORENSICS_VOLATILITY_TIMEOUT",
  volatilityPath: "FORENSICS_VOLATILITY_PATH",
  threatScoreThreshold: "FORENSICS_THREAT_THRESHOLD",
  confidenceThreshold: "FORENSICS_CONFIDENCE_THRESHOLD",
  evidenceBaseDir: "FORENSICS_EVIDENCE_DIR",
  plannerModel: "FORENSICS_PLANNER_MODEL",
  evaluatorModel: "FORENSICS_EVALUATOR_MODEL",
  analyzerModel: "FORENSICS_ANALYZER_MODEL",
  llmTimeout: "FORENSICS_LLM_TIMEOUT",
  llmTemperature: "FORENSICS_LLM_TEMPERATURE",
  llmMaxTokens: "FORENSICS_LLM_MAX_TOKENS",
  logLevel: "FORENSICS_LOG_LEVEL",
  openaiApiKey: "OPENAI_API_KEY",
  openaiBaseUrl: "OPENAI_BASE_URL",
};

/**
 * Build the runtime configuration from environment variables.
 * Empty strings count as unset so a blank `.env` line falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ForensicsConfig {
  const raw: Record<string, string> = {};
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") {
      raw[field] = value.trim();
    }
  }

  const parsed = ForensicsConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const envKeys = new Map<string, string>(Object.entries(ENV_KEYS));
    const fields = parsed.error.issues.map((issue) => {
      const field = String(issue.path[0]);
      return `${envKeys.get(field) ?? field}: ${issue.message}`;
    });
    throw Object.assign(new Error(`Invalid configuration: ${fields.join("; ")}`), {
      code: "invalid_config",
    });
  }
  return parsed.data;
}

/** Defaults only, ignoring the environment. */
export function defaultConfig(overrides: Partial<ForensicsConfig> = {}): ForensicsConfig {
  return { ...ForensicsConfigSchema.parse({}), ...overrides };
}
