import { describe, it, before, after } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { CommandExecutor, outputFileStem, sha256, type ExecutionSummaryFile } from "../execution/executor.js";
import { reusedResult } from "../execution/ledger.js";
import { FakeRunner, fixedClock, hasCode, quietLogger, tempDir, vol, FIXED_STAMP, FIXED_TIME } from "./helpers.js";

async function readLog(root: string): Promise<Array<Record<string, unknown>>> {
  const raw = await fs.readFile(path.join(root, "logs", "execution_log.jsonl"), "utf-8");
  return raw.trim().split("\n").map((line) => JSON.parse(line));
}

describe("command executor", () => {
  let base: string;
  let caseNo = 0;

  before(async () => {
    base = await tempDir("executor");
  });

  after(async () => {
    await fs.rm(base, { recursive: true, force: true });
  });

  function root(): string {
    caseNo += 1;
    return path.join(base, `run-${caseNo}`);
  }

  it("runs a validated command and saves its output as evidence", async () => {
    const stdout = "PID\tPPID\tImageFileName\n4\t0\tSystem\n";
    const runner = new FakeRunner({ "windows.pslist": { stdout } });
    const dir = root();
    const executor = new CommandExecutor(dir, { runner, logger: quietLogger, now: fixedClock });

    const result = await executor.execute({ command: vol("windows.pslist"), category: "processes" });

    assert.equal(result.status, "success");
    assert.equal(result.exit_code, 0);
    assert.equal(result.error_message, null);
    assert.equal(result.reused, false);
    assert.equal(result.timestamp, FIXED_TIME);
    assert.deepEqual(runner.calls, [["vol", "-f", "/cases/mem.raw", "windows.pslist"]]);
    assert.deepEqual(runner.timeouts, [600_000]);

    const expectedFile = path.join(dir, "02_processes", `${FIXED_STAMP}_windows.pslist.txt`);
    assert.equal(result.output_file, expectedFile);
    assert.equal(result.content_hash, sha256(stdout));
    const saved = await fs.readFile(expectedFile, "utf-8");
    assert.equal(saved, `Command: ${vol("windows.pslist")}\nTimestamp: ${FIXED_TIME}\n${"=".repeat(60)}\n${stdout}`);
  });

  it("creates the full evidence layout on first use", async () => {
    const dir = root();
    const executor = new CommandExecutor(dir, { runner: new FakeRunner(), logger: quietLogger, now: fixedClock });
    await executor.execute({ command: vol("windows.info") });
    const entries = (await fs.readdir(dir)).sort();
    assert.deepEqual(entries, [
      "01_triage",
      "02_processes",
      "03_network",
      "04_persistence",
      "05_memory",
      "06_timeline",
      "07_iocs",
      "logs",
    ]);
  });

  it("never launches a command the safety gate rejects", async () => {
    const runner = new FakeRunner();
    const dir = root();
    const executor = new CommandExecutor(dir, { runner, logger: quietLogger, now: fixedClock });

    const result = await executor.execute({ command: `${vol("windows.info")}; rm -rf /` });

    assert.equal(runner.calls.length, 0);
    assert.equal(result.status, "failed");
    assert.equal(result.exit_code, -1);
    assert.equal(result.execution_time, 0);
    assert.equal(result.error_message, 'Command failed security validation: Command contains forbidden pattern ";"');
    const log = await readLog(dir);
    assert.equal(log.length, 1);
    assert.equal(log[0]?.status, "failed");
  });

  it("labels malformed commands as parse failures", async () => {
    const executor = new CommandExecutor(root(), { runner: new FakeRunner(), logger: quietLogger, now: fixedClock });
    const result = await executor.execute({ command: "vol -f 'mem.raw windows.info" });
    assert.equal(result.status, "failed");
    assert.equal(result.error_message, "Command parsing failed: Invalid command syntax: no closing quotation (')");
  });

  it("records a nonzero exit as a failure without saving empty output", async () => {
    const runner = new FakeRunner({ "windows.netscan": { exitCode: 2, stderr: "unsupported layer" } });
    const executor = new CommandExecutor(root(), { runner, logger: quietLogger, now: fixedClock });
    const result = await executor.execute({ command: vol("windows.netscan"), category: "network" });
    assert.equal(result.status, "failed");
    assert.equal(result.exit_code, 2);
    assert.equal(result.stderr, "unsupported layer");
    assert.equal(result.error_message, "Command exited with code 2");
    assert.equal(result.output_file, null);
    assert.equal(result.content_hash, null);
  });

  it("reports timeouts distinctly from failures", async () => {
    const runner = new FakeRunner({ "windows.filescan": { timedOut: true, exitCode: -1 } });
    const executor = new CommandExecutor(root(), { runner, timeoutSeconds: 5, logger: quietLogger, now: fixedClock });
    const result = await executor.execute({ command: vol("windows.filescan") });
    assert.equal(result.status, "timeout");
    assert.equal(result.error_message, "Timeout after 5s");
    assert.equal(result.stderr, "Command timed out after 5 seconds");
    assert.deepEqual(runner.timeouts, [5000]);
  });

  it("reports launch errors as failures", async () => {
    const runner = new FakeRunner({}, { exitCode: -1, error: "spawn vol ENOENT" });
    const executor = new CommandExecutor(root(), { runner, logger: quietLogger, now: fixedClock });
    const result = await executor.execute({ command: vol("windows.info") });
    assert.equal(result.status, "failed");
    assert.equal(result.error_message, "Exception: spawn vol ENOENT");
    assert.equal(result.stderr, "spawn vol ENOENT");
  });

  it("swaps in the configured binary after validation", async () => {
    const runner = new FakeRunner();
    const executor = new CommandExecutor(root(), {
      runner,
      volatilityPath: "/opt/volatility3/vol.py",
      logger: quietLogger,
      now: fixedClock,
    });
    await executor.execute({ command: vol("windows.info") });
    assert.deepEqual(runner.calls, [["/opt/volatility3/vol.py", "-f", "/cases/mem.raw", "windows.info"]]);
  });

  it("suffixes evidence file names instead of overwriting", async () => {
    const runner = new FakeRunner({}, { stdout: "rows\n" });
    const dir = root();
    const executor = new CommandExecutor(dir, { runner, logger: quietLogger, now: fixedClock });
    const first = await executor.execute({ command: vol("windows.pslist"), category: "processes" });
    const second = await executor.execute({ command: "vol3 -f /cases/mem.raw windows.pslist", category: "processes" });
    assert.equal(first.output_file, path.join(dir, "02_processes", `${FIXED_STAMP}_windows.pslist.txt`));
    assert.equal(second.output_file, path.join(dir, "02_processes", `${FIXED_STAMP}_windows.pslist_2.txt`));
  });

  it("puts uncategorized output under logs and can skip saving", async () => {
    const runner = new FakeRunner({}, { stdout: "data\n" });
    const dir = root();
    const executor = new CommandExecutor(dir, { runner, logger: quietLogger, now: fixedClock });
    const general = await executor.execute({ command: vol("windows.info") });
    assert.equal(general.output_file, path.join(dir, "logs", `${FIXED_STAMP}_windows.info.txt`));

    const unsaved = await executor.execute({ command: vol("windows.modules"), saveOutput: false });
    assert.equal(unsaved.output_file, null);
    assert.equal(unsaved.content_hash, null);
    assert.equal(unsaved.stdout, "data\n");
  });

  it("logs every attempt, reused ones included, and summarizes executed ones", async () => {
    const runner = new FakeRunner({}, { stdout: "rows\n" });
    const dir = root();
    const executor = new CommandExecutor(dir, { runner, logger: quietLogger, now: fixedClock });
    const first = await executor.execute({ command: vol("windows.pslist"), context: { step: "Triage" } });
    await executor.recordReuse(
      reusedResult(first.command, { status: first.status, output_file: first.output_file }, FIXED_TIME),
      { step: "Processes" }
    );

    const log = await readLog(dir);
    assert.equal(log.length, 2);
    assert.equal(log[1]?.reused, true);
    assert.deepEqual(log[1]?.context, { step: "Processes" });

    const file = await executor.saveExecutionSummary();
    assert.equal(file, path.join(dir, "logs", `execution_summary_${FIXED_STAMP}.json`));
    const summary: ExecutionSummaryFile = JSON.parse(await fs.readFile(file, "utf-8"));
    assert.equal(summary.total_commands, 1);
    assert.equal(summary.successful_commands, 1);
    assert.equal(summary.reused_commands, 1);
    assert.equal(summary.execution_start, FIXED_TIME);
    assert.equal(summary.detailed_log.length, 2);
    assert.equal(summary.evidence_directories.network, path.join(dir, "03_network"));
  });

  it("fails hard when the evidence directory cannot be created", async () => {
    const blocker = path.join(base, "blocker");
    await fs.writeFile(blocker, "not a directory");
    const executor = new CommandExecutor(path.join(blocker, "run"), { runner: new FakeRunner(), logger: quietLogger });
    await assert.rejects(() => executor.prepare(), hasCode("evidence_dir_unwritable"));
  });

  it("derives evidence file stems from the last token", () => {
    assert.equal(outputFileStem(vol("windows.handles", "--pid", "1234")), "1234");
    assert.equal(outputFileStem("vol -f a.raw 'x/y'"), "xy");
    assert.equal(outputFileStem("vol -f a.raw %%%"), "unknown");
  });
});
