import { ConfigurationError } from "./errors.js";
import type { JobScriptConfig } from "./types.js";

export const DEFAULT_CONFIG: Readonly<JobScriptConfig> = Object.freeze({
  shebang: "#!/bin/bash",
  directivePrefix: "#SBATCH ",
  runPrefix: "srun ",
  dependencyMode: "afterany",
  submitCommand: "sbatch",
  submitArgs: [],
  accountingCommand: "sacct",
});

function asObject(value: unknown, label: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new ConfigurationError(`${label} must be an object`, label);
  }
  return Object.fromEntries(Object.entries(value));
}

function readString(value: unknown, field: string): string | undefined {
  if (value == null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigurationError(`${field} must be a string`, field);
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

// Prefixes are concatenated verbatim, so their trailing whitespace is significant.
function readPrefix(value: unknown, field: string): string | undefined {
  if (value == null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigurationError(`${field} must be a string`, field);
  }
  if (/[\r\n]/.test(value)) {
    throw new ConfigurationError(`${field} must not contain line breaks`, field);
  }
  return value;
}

function readNumber(value: unknown, field: string): number | undefined {
  if (value == null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isFinite(value) || value < 1) {
    throw new ConfigurationError(`${field} must be a positive number`, field);
  }
  return Math.floor(value);
}

function readStringArray(value: unknown, field: string): string[] {
  if (value == null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${field} must be an array of strings`, field);
  }
  return value
    .map((entry: unknown, idx) => {
      if (typeof entry !== "string") {
        throw new ConfigurationError(`${field}[${idx}] must be a string`, field);
      }
      return entry.trim();
    })
    .filter((entry) => entry.length > 0);
}

export function parseJobScriptConfig(value: unknown): JobScriptConfig {
  if (value == null) {
    return { ...DEFAULT_CONFIG, submitArgs: [] };
  }

  const obj = asObject(value, "slurm-jobscript config");
  const dependencyMode = readString(obj.dependencyMode, "dependencyMode");
  if (dependencyMode && /[\s,:]/.test(dependencyMode)) {
    throw new ConfigurationError(`dependencyMode is malformed: ${dependencyMode}`, "dependencyMode");
  }

  return {
    shebang: readPrefix(obj.shebang, "shebang")?.trim() || DEFAULT_CONFIG.shebang,
    directivePrefix: readPrefix(obj.directivePrefix, "directivePrefix") ?? DEFAULT_CONFIG.directivePrefix,
    runPrefix: readPrefix(obj.runPrefix, "runPrefix") ?? DEFAULT_CONFIG.runPrefix,
    dependencyMode: dependencyMode ?? DEFAULT_CONFIG.dependencyMode,
    submitCommand: readString(obj.submitCommand, "submitCommand") ?? DEFAULT_CONFIG.submitCommand,
    submitArgs: readStringArray(obj.submitArgs, "submitArgs"),
    accountingCommand:
      readString(obj.accountingCommand, "accountingCommand") ?? DEFAULT_CONFIG.accountingCommand,
    commandTimeoutMs: readNumber(obj.commandTimeoutMs, "commandTimeoutMs"),
  };
}
