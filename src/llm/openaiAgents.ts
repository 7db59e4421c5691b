import OpenAI from "openai";
import { z } from "zod";
import {
  llmFailure,
  llmOk,
  type ChunkInfo,
  type DeeperPlanRequest,
  type EvaluationVerdict,
  type InvestigationAgents,
  type LlmError,
  type LlmResult,
  type PlanRequest,
} from "./agents.js";
import {
  analyzerSystemPrompt,
  analyzerUserPrompt,
  deeperSystemPrompt,
  deeperUserPrompt,
  evaluatorSystemPrompt,
  evaluatorUserPrompt,
  plannerSystemPrompt,
  plannerUserPrompt,
} from "./prompts.js";
import { AnalysisResultSchema } from "../analysis/schema.js";
import { parsePlanText, PlanValidationError } from "../plan/validate.js";
import type { InvestigationPlan } from "../plan/schema.js";
import type { ForensicsConfig } from "../config.js";
import { logger } from "../logger.js";
import type { AnalysisResult } from "../types.js";

// ── Output schemas ──

export const EvaluatorOutputSchema = z.object({
  success_criteria_met: z.boolean(),
  feedback: z.string().default(""),
  user_input_needed: z.boolean().default(false),
});

export const AnalysisOutputSchema = AnalysisResultSchema;

export const DeeperPlanResponseSchema = z.object({
  targeted_commands: z.array(z.union([z.string(), z.object({ command: z.string() }).passthrough()])),
  rationale: z.string().optional(),
});

const log = logger.child({ component: "llm" });

/** Maps an SDK error to the retry classification. Never inspects message text. */
export function classifyError(err: unknown): LlmError {
  if (err instanceof OpenAI.RateLimitError) {
    const header = err.headers?.["retry-after"];
    const seconds = header ? Number(header) : NaN;
    return Number.isFinite(seconds) && seconds >= 0 ? { kind: "rate_limited", retryAfterSeconds: seconds } : { kind: "rate_limited" };
  }
  return { kind: "other", message: err instanceof Error ? err.message : String(err) };
}

export function parseJsonOutput<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): LlmResult<T> {
  let data: unknown;
  try {
    data = parsePlanText(text);
  } catch (err: unknown) {
    return llmFailure(err instanceof PlanValidationError ? err.message : `Invalid JSON from model: ${String(err)}`);
  }
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    return llmFailure(`Model output does not match schema: ${issues}`);
  }
  return llmOk(parsed.data);
}

interface CompletionSettings {
  model: string;
  system: string;
  user: string;
}

export class OpenAIAgents implements InvestigationAgents {
  private readonly client: OpenAI;
  private readonly config: ForensicsConfig;

  constructor(config: ForensicsConfig, client?: OpenAI) {
    this.config = config;
    if (client) {
      this.client = client;
    } else {
      if (!config.openaiApiKey) {
        throw Object.assign(new Error("Invalid configuration: OPENAI_API_KEY is required for model-backed commands"), {
          code: "invalid_config",
        });
      }
      // Rate limits are retried by withRateLimitRetry, not inside the SDK.
      this.client = new OpenAI({
        apiKey: config.openaiApiKey,
        baseURL: config.openaiBaseUrl,
        timeout: config.llmTimeout * 1000,
        maxRetries: 0,
      });
    }
  }

  async plan(request: PlanRequest): Promise<LlmResult<string>> {
    return this.complete({
      model: this.config.plannerModel,
      system: plannerSystemPrompt(request.dumpPath, request.osHint),
      user: plannerUserPrompt(request),
    });
  }

  async evaluate(plan: InvestigationPlan): Promise<LlmResult<EvaluationVerdict>> {
    const text = await this.complete({
      model: this.config.evaluatorModel,
      system: evaluatorSystemPrompt(plan.inputs.os_hint ?? "windows"),
      user: evaluatorUserPrompt(plan),
    });
    return text.ok ? parseJsonOutput(text.value, EvaluatorOutputSchema) : text;
  }

  async analyze(context: string, chunk: ChunkInfo | null): Promise<LlmResult<AnalysisResult>> {
    const text = await this.complete({
      model: this.config.analyzerModel,
      system: analyzerSystemPrompt(),
      user: analyzerUserPrompt(context, chunk),
    });
    return text.ok ? parseJsonOutput(text.value, AnalysisOutputSchema) : text;
  }

  async planDeeper(request: DeeperPlanRequest): Promise<LlmResult<string[]>> {
    const text = await this.complete({
      model: this.config.plannerModel,
      system: deeperSystemPrompt(request.dumpPath, request.osHint),
      user: deeperUserPrompt(request.findings),
    });
    if (!text.ok) return text;
    const parsed = parseJsonOutput(text.value, DeeperPlanResponseSchema);
    if (!parsed.ok) return parsed;
    return llmOk(parsed.value.targeted_commands.map((c) => (typeof c === "string" ? c : c.command)));
  }

  private async complete(settings: CompletionSettings): Promise<LlmResult<string>> {
    try {
      const response = await this.client.chat.completions.create({
        model: settings.model,
        temperature: this.config.llmTemperature,
        max_tokens: this.config.llmMaxTokens,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: settings.system },
          { role: "user", content: settings.user },
        ],
      });
      const content = response.choices[0]?.message.content;
      if (!content) {
        return llmFailure("Model returned an empty response");
      }
      return llmOk(content);
    } catch (err: unknown) {
      const error = classifyError(err);
      log.warn("Model call failed", { model: settings.model, kind: error.kind });
      return { ok: false, error };
    }
  }
}
