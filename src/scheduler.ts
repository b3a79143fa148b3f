import path from "node:path";
import { defaultCommandRunner, runChecked, type CommandOptions } from "./exec.js";
import { ConfigurationError, QueryError, SubmissionError } from "./errors.js";
import { parseAccountingState } from "./slurm.js";
import type { CommandRunner, JobScriptConfig, SchedulerClient } from "./types.js";

export type SlurmSchedulerParams = {
  config: Pick<
    JobScriptConfig,
    "submitCommand" | "submitArgs" | "accountingCommand" | "commandTimeoutMs"
  >;
  runner?: CommandRunner;
};

/** Talks to a local SLURM installation through `sbatch` and `sacct`. */
export class SlurmScheduler implements SchedulerClient {
  private readonly config: SlurmSchedulerParams["config"];
  private readonly runner: CommandRunner;

  constructor(params: SlurmSchedulerParams) {
    this.config = params.config;
    this.runner = params.runner ?? defaultCommandRunner;
  }

  private options(cwd?: string): CommandOptions | undefined {
    const timeoutMs = this.config.commandTimeoutMs;
    if (cwd == null && timeoutMs == null) {
      return undefined;
    }
    return { cwd, timeoutMs };
  }

  async submit(scriptPath: string): Promise<string> {
    const args = [...this.config.submitArgs, scriptPath];
    const result = await runChecked(
      this.runner,
      this.config.submitCommand,
      args,
      this.options(path.dirname(scriptPath)),
      (message, cause) => new SubmissionError(message, cause !== undefined ? { cause } : undefined),
    );
    return result.stdout.trim() ? result.stdout : result.stderr;
  }

  async queryState(jobId: string): Promise<string> {
    const args = ["-j", jobId, "-b", "-n", "-p", "-X"];
    const result = await runChecked(
      this.runner,
      this.config.accountingCommand,
      args,
      this.options(),
      (message, cause) => new QueryError(message, { jobId, cause }),
    );
    return result.stdout;
  }
}

/**
 * Queries the accounting database for a job that may have been submitted elsewhere.
 */
export async function queryJobState(scheduler: SchedulerClient, jobId: string): Promise<string> {
  const id = jobId.trim();
  if (!id) {
    throw new ConfigurationError("jobId is required", "jobId");
  }
  const output = await scheduler.queryState(id);
  return parseAccountingState(id, output);
}
