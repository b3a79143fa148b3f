import { spawn } from "node:child_process";
import type { CommandResult, CommandRunner } from "./types.js";

export type CommandOptions = { cwd?: string; timeoutMs?: number };

export const defaultCommandRunner: CommandRunner = async (command, args, options = {}) => {
  const timeoutMs = options.timeoutMs ?? 0;
  return await new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
      env: process.env,
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;
    const timer =
      timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGTERM");
          }, timeoutMs)
        : undefined;

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.once("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });

    child.once("close", (code) => {
      clearTimeout(timer);
      resolve({
        code: code ?? 1,
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8"),
        ...(timedOut ? { timedOut } : {}),
      });
    });
  });
};

export function describeFailure(result: CommandResult): string {
  return result.stderr.trim() || result.stdout.trim() || `exit code ${result.code}`;
}

/**
 * Runs a command and converts spawn failures, timeouts and non-zero exits into
 * the error built by `fail`.
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: string[],
  options: CommandOptions | undefined,
  fail: (message: string, cause?: unknown) => Error,
): Promise<CommandResult> {
  let result: CommandResult;
  try {
    result = await runner(command, args, options);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw fail(`${command} failed: ${detail}`, error);
  }
  if (result.timedOut) {
    throw fail(`${command} timed out after ${options?.timeoutMs ?? 0}ms`);
  }
  if (result.code !== 0) {
    throw fail(`${command} failed: ${describeFailure(result)}`);
  }
  return result;
}
