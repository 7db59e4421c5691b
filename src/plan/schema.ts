import { z } from "zod";

export const OS_HINTS = ["windows", "linux", "macos"] as const;
export const EXPORT_FORMATS = ["json", "csv", "pdf", "md"] as const;

export const StepSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  commands: z.array(z.string()),
  parse_expectations: z.string().default(""),
  success_criteria: z.string().optional(),
  suspicion_heuristics: z.array(z.string()).default([]),
  actions_on_hits: z.array(z.string()).default([]),
  evidence_outputs: z.array(z.string()).default([]),
});

export const PhaseSchema = z.object({
  name: z.string(),
  steps: z.array(StepSchema),
});

export const PlanInputsSchema = z.object({
  dump_path: z.string(),
  os_hint: z.string().nullable().optional(),
  volatility_path: z.string().optional(),
  ioc_set: z
    .object({
      hashes: z.array(z.string()).optional(),
      domains: z.array(z.string()).optional(),
      ips: z.array(z.string()).optional(),
      yara_rules: z.array(z.string()).optional(),
    })
    .optional(),
});

/** The part of a plan the execution engine reads. */
export const ExecutablePlanSchema = z.object({
  plan_version: z.string(),
  inputs: PlanInputsSchema,
  global_triage: z.array(StepSchema).default([]),
  os_workflows: z.object({ phases: z.array(PhaseSchema) }).default({ phases: [] }),
});

/** Full planner output, checked once at the boundary. */
export const InvestigationPlanSchema = ExecutablePlanSchema.extend({
  inputs: PlanInputsSchema.extend({ os_hint: z.enum(OS_HINTS).optional() }),
  goals: z.array(z.string()),
  constraints: z.array(z.string()),
  global_triage: z.array(StepSchema),
  os_workflows: z.object({ phases: z.array(PhaseSchema) }),
  ioc_correlation: z.object({
    hashing: z.array(z.string()),
    network: z.array(z.string()),
    yara: z.array(z.string()),
    scoring: z.object({
      process: z.string(),
      module: z.string(),
      persistence_item: z.string(),
    }),
  }),
  artifact_preservation: z.object({
    directory_structure: z.array(z.string()),
    chain_of_custody: z.array(z.string()),
  }),
  reporting: z.object({
    executive_summary: z.array(z.string()),
    technical_appendix: z.array(z.string()),
    export_formats: z.array(z.enum(EXPORT_FORMATS)),
  }),
});

export type PlanStep = z.infer<typeof StepSchema>;
export type ExecutablePlan = z.infer<typeof ExecutablePlanSchema>;
export type InvestigationPlan = z.infer<typeof InvestigationPlanSchema>;
