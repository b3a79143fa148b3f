import type { JobScriptLogger } from "./types.js";

export const LOG_PREFIX = "[slurm-jobscript]";

export const silentLogger: JobScriptLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function createConsoleLogger(options: { verbose?: boolean } = {}): JobScriptLogger {
  return {
    debug: options.verbose ? (message) => console.error(message) : undefined,
    info: (message) => console.error(message),
    warn: (message) => console.error(message),
    error: (message) => console.error(message),
  };
}
