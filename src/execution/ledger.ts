import type { CommandResult, LedgerEntry } from "../types.js";

/**
 * At-most-once record of executed commands for one investigation run.
 *
 * Keys are the exact command strings: `vol -f a.raw windows.pslist` and the same
 * text with a double space are different commands and both execute. One instance
 * is shared by global triage and every phase of a run; deeper analysis gets its own.
 *
 * Lookup and record happen on the single executor control flow. Running phases
 * in parallel would need a lock around the check-then-record pair.
 */
export class DeduplicationLedger {
  private readonly entries = new Map<string, LedgerEntry>();

  lookup(command: string): LedgerEntry | undefined {
    return this.entries.get(command);
  }

  record(command: string, entry: LedgerEntry): void {
    if (!this.entries.has(command)) {
      this.entries.set(command, { ...entry });
    }
  }

  get size(): number {
    return this.entries.size;
  }
}

/** Lightweight stand-in for a ledger hit; the output itself stays on disk. */
export function reusedResult(command: string, entry: LedgerEntry, timestamp: string): CommandResult {
  return {
    command,
    status: entry.status,
    stdout: "",
    stderr: "",
    exit_code: entry.status === "success" ? 0 : 1,
    execution_time: 0,
    timestamp,
    content_hash: null,
    output_file: entry.output_file,
    error_message: null,
    reused: true,
  };
}
