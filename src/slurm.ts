import { formatDirective } from "./directives.js";
import { QueryError, SubmissionParseError } from "./errors.js";
import type { JobScriptSnapshot, JobStateClass } from "./types.js";

const ACTIVE_STATES = new Set(["PENDING", "RUNNING"]);

export function renderJobScript(params: {
  job: JobScriptSnapshot;
  directivePrefix: string;
  runPrefix: string;
}): string {
  const { job, directivePrefix, runPrefix } = params;
  if (job.steps.length === 0) {
    throw new Error("At least one job step is required to render a SLURM script");
  }

  const lines: string[] = [job.shebang];

  for (const directive of job.directives) {
    lines.push(`${directivePrefix}${formatDirective(directive)}`);
  }

  if (job.dependencies.length > 0) {
    lines.push(
      `${directivePrefix}--dependency=${job.dependencyMode}:${job.dependencies.join(",")}`,
    );
  }

  for (const mod of job.modules) {
    lines.push(`module load ${mod}`);
  }

  for (const step of job.steps) {
    lines.push(`${runPrefix}${step}`);
  }

  return `${lines.join("\n")}\n`;
}

/**
 * Reads the job id from `Submitted batch job <id>`, optionally followed by
 * `on cluster <name>` when sbatch targets a federated cluster.
 */
export function parseSubmittedJobId(output: string): string {
  const tokens = output.trim().split(/\s+/);
  const [submitted, batch, job, jobId] = tokens;
  if (
    submitted !== "Submitted" ||
    batch !== "batch" ||
    job !== "job" ||
    !jobId ||
    !/^\d+$/.test(jobId)
  ) {
    throw new SubmissionParseError(output);
  }
  return jobId;
}

/**
 * Extracts the state column from `sacct -b -n -p -X` output (`JobID|State|ExitCode|`).
 */
export function parseAccountingState(jobId: string, output: string): string {
  const line = output
    .split(/\r?\n/)
    .map((item) => item.trim())
    .find((item) => item.length > 0);
  if (!line) {
    throw new QueryError(`sacct returned no record for job ${jobId}`, { jobId, output });
  }
  const fields = line.split("|");
  const state = fields[1]?.trim();
  if (fields.length < 2 || !state) {
    throw new QueryError(`Unexpected sacct output for job ${jobId}: ${line}`, {
      jobId,
      output,
    });
  }
  return state;
}

export function isActiveState(state: string): boolean {
  return ACTIVE_STATES.has(state.toUpperCase());
}

export function classifyState(state: string | undefined): JobStateClass {
  if (!state) {
    return "unsubmitted";
  }
  return isActiveState(state) ? "active" : "finished";
}
