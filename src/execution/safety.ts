// Command safety gate. The only place untrusted command text becomes an argument
// vector; everything downstream consumes ValidatedCommand.argv and never the string.
import { parse, quote } from "shell-quote";

export const LAUNCHERS = ["vol", "vol3"] as const;
export type Launcher = (typeof LAUNCHERS)[number];

const LAUNCHER_PREFIXES = LAUNCHERS.map((l) => `${l} `);

const DENYLIST = [
  "&&", "||", ";", "|", "`", "$",
  ">", ">>",
  "\n", "\r",
  "rm ", "del ", "format", "fdisk", "wget", "curl", "nc ",
];

const TOKEN_FORBIDDEN_CHARS = ["&", "|", ";", "`", "$", "\n", "\r"];

export type RejectionKind = "safety_rejection" | "parse_failure";

export type SafetyVerdict =
  | { safe: true; command: ValidatedCommand }
  | { safe: false; kind: RejectionKind; reason: string };

export type TokenizeResult = { ok: true; argv: string[] } | { ok: false; reason: string };

export class ValidatedCommand {
  readonly command: string;
  readonly argv: readonly string[];
  readonly launcher: Launcher;

  private constructor(command: string, argv: string[], launcher: Launcher) {
    this.command = command;
    this.argv = Object.freeze(argv);
    this.launcher = launcher;
  }

  /** Plugin name: the first argument after `-f <dump>`, when present. */
  get plugin(): string | null {
    const idx = this.argv.indexOf("-f");
    const candidate = idx >= 0 ? this.argv[idx + 2] : this.argv[1];
    return candidate ?? null;
  }

  static from(command: string): SafetyVerdict {
    const screen = screenCommand(command);
    if (screen !== null) {
      return { safe: false, kind: "safety_rejection", reason: screen };
    }

    const tokens = tokenize(command);
    if (!tokens.ok) {
      return { safe: false, kind: "parse_failure", reason: tokens.reason };
    }

    const [first, ...rest] = tokens.argv;
    const launcher = LAUNCHERS.find((l) => l === first);
    if (!launcher) {
      return {
        safe: false,
        kind: "safety_rejection",
        reason: `Command must start with ${LAUNCHERS.map((l) => `'${l}'`).join(" or ")}, got: ${first ?? "(empty)"}`,
      };
    }

    for (const token of rest) {
      const bad = TOKEN_FORBIDDEN_CHARS.find((c) => token.includes(c));
      if (bad !== undefined) {
        return {
          safe: false,
          kind: "safety_rejection",
          reason: `Suspicious character ${JSON.stringify(bad)} in argument: ${token}`,
        };
      }
    }

    return { safe: true, command: new ValidatedCommand(command, tokens.argv, launcher) };
  }
}

/**
 * Prefix and substring screen over the lower-cased command.
 * Returns the rejection reason, or null when the command passes.
 */
export function screenCommand(command: string): string | null {
  const normalized = command.trim().toLowerCase();
  if (!LAUNCHER_PREFIXES.some((p) => normalized.startsWith(p))) {
    return `Command must start with one of: ${LAUNCHER_PREFIXES.map((p) => p.trim()).join(", ")}`;
  }
  const hit = DENYLIST.find((pattern) => normalized.includes(pattern));
  if (hit !== undefined) {
    return `Command contains forbidden pattern ${JSON.stringify(hit)}`;
  }
  return null;
}

export function isSafe(command: string): boolean {
  return ValidatedCommand.from(command).safe;
}

function unbalancedQuote(command: string): string | null {
  let open: "'" | '"' | null = null;
  for (let i = 0; i < command.length; i++) {
    const ch = command[i];
    if (open === "'") {
      if (ch === "'") open = null;
      continue;
    }
    if (ch === "\\") {
      i++;
      continue;
    }
    if (open === '"') {
      if (ch === '"') open = null;
      continue;
    }
    if (ch === "'" || ch === '"') open = ch;
  }
  return open;
}

/**
 * Quote-aware word splitting. Operators, comments and redirections are
 * parse failures; a glob comes back as its literal pattern since nothing
 * here runs through a shell.
 */
export function tokenize(command: string): TokenizeResult {
  const quote = unbalancedQuote(command);
  if (quote !== null) {
    return { ok: false, reason: `Invalid command syntax: no closing quotation (${quote})` };
  }

  const argv: string[] = [];
  for (const entry of parse(command, (key) => `$${key}`)) {
    if (typeof entry === "string") {
      argv.push(entry);
    } else if ("pattern" in entry) {
      argv.push(entry.pattern);
    } else if ("comment" in entry) {
      return { ok: false, reason: `Invalid command syntax: unexpected comment #${entry.comment}` };
    } else {
      return { ok: false, reason: `Invalid command syntax: unexpected operator ${entry.op}` };
    }
  }

  if (argv.length === 0) {
    return { ok: false, reason: "Empty command" };
  }
  return { ok: true, argv };
}

/** `vol -f <dump>` with the dump path quoted for {@link tokenize}. */
export function launcherPrefix(dumpPath: string, launcher: Launcher = "vol"): string {
  return quote([launcher, "-f", dumpPath]);
}

export function buildCommand(dumpPath: string, plugin: string, ...args: string[]): string {
  return quote([LAUNCHERS[0], "-f", dumpPath, plugin, ...args]);
}
