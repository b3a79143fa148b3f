import { ConfigurationError } from "./errors.js";
import type { SlurmDirective } from "./types.js";

const LONG_FLAG_MARKER = "--";

/**
 * Classifies a raw directive such as `--mem=4g`, `--array 1-10` or `-c 1`.
 *
 * Input containing `--` is split on whitespace and later rendered space-joined; anything
 * else is split on its first `=` and rendered `=`-joined.
 */
export function parseDirective(raw: string): SlurmDirective {
  const trimmed = readLine(raw, "directives");

  if (trimmed.includes(LONG_FLAG_MARKER)) {
    const [key, ...args] = trimmed.split(/\s+/);
    return { kind: "space", key: key ?? trimmed, args };
  }

  const eq = trimmed.indexOf("=");
  if (eq === -1) {
    return { kind: "equals", key: trimmed };
  }
  const key = trimmed.slice(0, eq);
  if (!key) {
    throw new ConfigurationError(`Directive is missing a key: ${trimmed}`, "directives");
  }
  return { kind: "equals", key, value: trimmed.slice(eq + 1) };
}

export function formatDirective(directive: SlurmDirective): string {
  switch (directive.kind) {
    case "space":
      return [directive.key, ...directive.args].join(" ");
    case "equals":
      return directive.value === undefined ? directive.key : `${directive.key}=${directive.value}`;
    default:
      directive satisfies never;
      throw new Error(`Unsupported directive: ${JSON.stringify(directive)}`);
  }
}

const LINE_BREAK = /[\r\n]/;

// Every rendered entry must stay on a single script line.
export function readLine(value: string, field: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new ConfigurationError(`${field} cannot be empty`, field);
  }
  if (LINE_BREAK.test(trimmed)) {
    throw new ConfigurationError(`${field} must be a single line: ${JSON.stringify(trimmed)}`, field);
  }
  return trimmed;
}

function readToken(value: string, field: string, forbidden: RegExp): string {
  const trimmed = readLine(value, field);
  if (forbidden.test(trimmed)) {
    throw new ConfigurationError(`${field} is malformed: ${trimmed}`, field);
  }
  return trimmed;
}

export function normalizeDependency(jobId: string): string {
  return readToken(jobId, "dependencies", /[\s,:]/);
}

export function normalizeDependencyMode(mode: string): string {
  return readToken(mode, "dependencyMode", /[\s,:]/);
}

export function normalizeModule(name: string): string {
  return readLine(name, "modules");
}

export function normalizeStep(command: string): string {
  return readLine(command, "command");
}
