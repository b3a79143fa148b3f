import path from "node:path";
import { ConfigurationError } from "./errors.js";

export function isPathInside(base: string, candidate: string): boolean {
  const rel = path.relative(path.resolve(base), path.resolve(candidate));
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

export function resolveScriptPath(workDir: string, scriptName: string): string {
  const name = scriptName.trim();
  if (!name) {
    throw new ConfigurationError("scriptName is required", "scriptName");
  }
  const base = path.resolve(workDir);
  const resolved = path.join(base, name);
  if (resolved === base || !isPathInside(base, resolved)) {
    throw new ConfigurationError(`scriptName must stay inside ${base}: ${scriptName}`, "scriptName");
  }
  return resolved;
}
