import { CommandError } from "../types/errors";

export interface ParsedArgs {
  flags: Record<string, string | boolean>;
  positionals: string[];
}

// flags that never take a value
const BOOLEAN_FLAGS = new Set(["dry-run", "skip-register", "help"]);

export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positionals: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      positionals.push(token);
      continue;
    }
    const eq = token.indexOf("=");
    if (eq > 2) {
      flags[token.slice(2, eq)] = token.slice(eq + 1);
      continue;
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (BOOLEAN_FLAGS.has(key) || next === undefined || next.startsWith("--")) {
      flags[key] = true;
      continue;
    }
    flags[key] = next;
    i += 1;
  }
  return { flags, positionals };
}

export function stringFlag(flags: ParsedArgs["flags"], key: string): string | undefined {
  const value = flags[key];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

/** Exit status of the first failing step, like a fail-fast shell script. */
export function exitCodeFor(err: unknown): number {
  if (err instanceof CommandError && err.exitCode > 0) return err.exitCode;
  return 1;
}
