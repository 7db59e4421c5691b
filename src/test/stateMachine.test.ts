import { describe, it, before, after } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Investigation, type InvestigationDeps } from "../investigation/stateMachine.js";
import { defaultConfig } from "../config.js";
import { getIndex } from "../storage/index.js";
import type { ForensicsConfig } from "../config.js";
import {
  DUMP,
  FIXED_STAMP,
  FakeAgents,
  FakeRunner,
  analysis,
  charCounter,
  fixedClock,
  fullPlan,
  quietLogger,
  tempDir,
} from "./helpers.js";

const planText = JSON.stringify(fullPlan());

const approve = { ok: true as const, value: { success_criteria_met: true, feedback: "", user_input_needed: false } };

describe("investigation state machine", () => {
  let base: string;

  before(async () => {
    base = await tempDir("investigation");
  });

  after(async () => {
    await fs.rm(base, { recursive: true, force: true });
  });

  function deps(agents: FakeAgents, runner: FakeRunner, overrides: Partial<ForensicsConfig> = {}): InvestigationDeps {
    return {
      agents,
      runner,
      config: defaultConfig({
        evidenceBaseDir: base,
        maxChunkTokens: 1_000_000,
        chunkConcurrency: 1,
        threatScoreThreshold: 7,
        confidenceThreshold: 0.5,
        ...overrides,
      }),
      countTokens: charCounter,
      logger: quietLogger,
      now: fixedClock,
      sleep: async () => {},
    };
  }

  it("plans, executes and analyzes a clean image", async () => {
    const agents = new FakeAgents({ plans: [{ ok: true, value: planText }] });
    const runner = new FakeRunner();
    const state = await new Investigation({ dumpPath: DUMP, osHint: "windows", id: "happy" }, deps(agents, runner)).run();

    assert.deepEqual(
      state.transitions.map((t) => t.to),
      ["validating", "evaluating", "executing", "triaging", "done"]
    );
    assert.equal(state.outcome, "completed");
    assert.equal(state.retry_count, 1);
    assert.equal(state.plan_source, "model");
    assert.deepEqual(runner.calls.map((argv) => argv[3]), ["windows.info", "windows.pslist"]);

    const evidenceDir = path.join(base, "happy");
    assert.equal(state.evidence_directory, evidenceDir);
    assert.equal(state.analysis?.threat_score, 2);
    assert.equal(state.analysis_file, path.join(evidenceDir, "analysis_results", `single_analysis_${FIXED_STAMP}.json`));
    assert.deepEqual(state.escalation_reasons, []);
    assert.equal(state.deeper, null);
    assert.equal(agents.analyzed.length, 1);
    assert.equal(agents.analyzed[0]?.chunk, null);

    await fs.access(path.join(evidenceDir, "logs", `investigation_report_${FIXED_STAMP}.json`));
    const entry = (await getIndex(base)).find((e) => e.id === "happy");
    assert.equal(entry?.stage, "done");
    assert.equal(entry?.outcome, "completed");
    assert.equal(entry?.threat_score, 2);
  });

  it("advances one stage per step", async () => {
    const agents = new FakeAgents({ plans: [{ ok: true, value: planText }] });
    const investigation = new Investigation({ dumpPath: DUMP, id: "stepwise" }, deps(agents, new FakeRunner()));
    assert.equal(investigation.state.stage, "planning");
    assert.equal(await investigation.step(), "validating");
    assert.equal(await investigation.step(), "evaluating");
    assert.equal(investigation.state.plan?.plan_version, "1.0.0");
  });

  it("replans with validator feedback after an invalid plan", async () => {
    const agents = new FakeAgents({ plans: [{ ok: true, value: "Sure! Here is the plan." }, { ok: true, value: planText }] });
    const state = await new Investigation({ dumpPath: DUMP, id: "replan" }, deps(agents, new FakeRunner())).run();

    assert.equal(state.outcome, "completed");
    assert.equal(state.retry_count, 2);
    assert.equal(agents.planRequests.length, 2);
    assert.equal(agents.planRequests[1]?.attempt, 2);
    assert.ok(agents.planRequests[1]?.feedback?.startsWith("Plan validation failed: Failed to parse plan JSON:"));
    assert.equal(agents.evaluated.length, 1);
  });

  it("replans with evaluator feedback after a rejection", async () => {
    const agents = new FakeAgents({
      plans: [{ ok: true, value: planText }],
      evaluations: [
        { ok: true, value: { success_criteria_met: false, feedback: "Add a network phase", user_input_needed: false } },
        { ok: false, error: { kind: "other", message: "timeout" } },
        approve,
      ],
    });
    const state = await new Investigation({ dumpPath: DUMP, id: "rejected" }, deps(agents, new FakeRunner())).run();

    assert.equal(state.outcome, "completed");
    assert.equal(state.retry_count, 3);
    assert.equal(agents.planRequests[1]?.feedback, "Add a network phase");
    assert.equal(agents.planRequests[2]?.feedback, "Evaluation failed: timeout");
    assert.equal(state.feedback, null);
  });

  it("gives up once planning attempts are exhausted", async () => {
    const agents = new FakeAgents({ plans: [{ ok: true, value: "{}" }] });
    const runner = new FakeRunner();
    const state = await new Investigation({ dumpPath: DUMP, id: "exhausted" }, deps(agents, runner, { maxPlanRetries: 2 })).run();

    assert.equal(state.outcome, "failed");
    assert.equal(state.retry_count, 2);
    assert.equal(agents.planRequests.length, 2);
    assert.equal(runner.calls.length, 0);
    assert.equal(state.run, null);
    const last = state.transitions[state.transitions.length - 1];
    assert.equal(last?.to, "done");
    assert.ok(last?.reason.startsWith("planning attempts exhausted after 2: Plan validation failed: Investigation plan does not conform to schema"));
  });

  it("falls back to the minimal plan when the planner is unavailable", async () => {
    const agents = new FakeAgents({ plans: [{ ok: false, error: { kind: "other", message: "connection refused" } }] });
    const runner = new FakeRunner();
    const state = await new Investigation({ dumpPath: DUMP, id: "fallback" }, deps(agents, runner)).run();

    assert.equal(state.plan_source, "fallback");
    assert.equal(state.plan?.plan_version, "1.0.0-fallback");
    assert.deepEqual(runner.calls, [["vol", "-f", DUMP, "windows.info"]]);
    assert.equal(state.outcome, "completed");
  });

  it("escalates to a targeted deeper pass", async () => {
    const injection = {
      finding_type: "code_injection",
      description: "Injected code in explorer.exe",
      severity: "high",
      evidence: "PID 1234",
      score: 9,
    };
    const agents = new FakeAgents({
      plans: [{ ok: true, value: planText }],
      analyses: [
        { ok: true, value: analysis({ threat_score: 8, suspicious_findings: [injection] }) },
        { ok: true, value: analysis({ threat_score: 9 }) },
      ],
    });
    const runner = new FakeRunner();
    const state = await new Investigation({ dumpPath: DUMP, id: "escalated" }, deps(agents, runner)).run();

    assert.deepEqual(
      state.transitions.map((t) => t.to),
      ["validating", "evaluating", "executing", "triaging", "deeper_analysis", "done"]
    );
    assert.deepEqual(state.escalation_reasons, [
      "threat score 8 >= 7",
      "high severity finding: code_injection",
      "code_injection finding",
    ]);
    assert.deepEqual(runner.calls.map((argv) => argv[3]), [
      "windows.info",
      "windows.pslist",
      "windows.malfind",
      "windows.hollowfind",
      "windows.injected",
      "windows.dumpfiles",
    ]);
    assert.equal(state.deeper?.source, "fallback");
    assert.equal(state.deeper?.analysis?.threat_score, 9);
    assert.equal(
      state.deeper?.analysis_file,
      path.join(base, "escalated", "deeper_analysis", "analysis_results", `deeper_analysis_${FIXED_STAMP}.json`)
    );
    assert.equal(state.outcome, "completed");

    const entry = (await getIndex(base)).find((e) => e.id === "escalated");
    assert.equal(entry?.threat_score, 9);
  });

  it("stops without analysis when execution fails", async () => {
    const agents = new FakeAgents({ plans: [{ ok: true, value: planText }] });
    const state = await new Investigation(
      { dumpPath: DUMP, id: "broken-run" },
      deps(agents, new FakeRunner({}, { exitCode: 1, stderr: "unable to read dump" }))
    ).run();

    assert.equal(state.outcome, "failed");
    assert.equal(state.run?.execution_status, "failed");
    assert.equal(agents.analyzed.length, 0);
    assert.equal(state.transitions[state.transitions.length - 1]?.reason, "execution failed");
  });

  it("fails when the evidence directory cannot be created", async () => {
    const blocker = path.join(base, "blocker");
    await fs.writeFile(blocker, "not a directory");
    const agents = new FakeAgents({ plans: [{ ok: true, value: planText }] });
    const runner = new FakeRunner();
    const state = await new Investigation(
      { dumpPath: DUMP, id: "unwritable" },
      { ...deps(agents, runner, { evidenceBaseDir: blocker }), dataDir: base }
    ).run();

    assert.equal(state.outcome, "failed");
    assert.equal(runner.calls.length, 0);
    assert.ok(state.error?.startsWith(`Evidence directory ${path.join(blocker, "unwritable")} is not writable`));
    const entry = (await getIndex(base)).find((e) => e.id === "unwritable");
    assert.equal(entry?.outcome, "failed");
  });
});
