import path from "node:path";
import { Type } from "@sinclair/typebox";
import { parseJobScriptConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { buildJobScript, parseJobDefinition, type JobDefinition } from "./job-file.js";
import { silentLogger } from "./logger.js";
import { SlurmScheduler, queryJobState } from "./scheduler.js";
import { classifyState } from "./slurm.js";
import type {
  CommandRunner,
  JobScriptConfig,
  JobScriptLogger,
  SchedulerClient,
} from "./types.js";

const ACTIONS = ["render", "write", "submit", "submit_and_cleanup", "job_state"] as const;

function stringEnum<const T extends readonly string[]>(
  values: T,
  options: { description?: string } = {},
) {
  return Type.Unsafe<T[number]>({ type: "string", enum: [...values], ...options });
}

export const JobScriptToolSchema = Type.Object(
  {
    action: stringEnum(ACTIONS, {
      description: `Action to perform: ${ACTIONS.join(", ")}`,
    }),
    command: Type.Optional(Type.String({ description: "First job step (srun is prepended)" })),
    commands: Type.Optional(
      Type.Array(Type.String(), { description: "Job steps in execution order" }),
    ),
    scriptName: Type.Optional(Type.String({ description: "Script file name inside the work dir" })),
    directives: Type.Optional(
      Type.Array(Type.String(), { description: "Raw directives, e.g. --mem=4g or -c 1" }),
    ),
    dependencies: Type.Optional(
      Type.Array(Type.Union([Type.String(), Type.Integer({ minimum: 0 })]), {
        description: "Job ids this job waits on",
      }),
    ),
    dependencyMode: Type.Optional(
      Type.String({ description: "Dependency type applied to all dependencies" }),
    ),
    modules: Type.Optional(Type.Array(Type.String(), { description: "Modules to load" })),
    shebang: Type.Optional(Type.String({ description: "Interpreter line" })),
    jobId: Type.Optional(Type.String({ description: "SLURM job id for job_state" })),
  },
  { additionalProperties: false },
);

export type JobScriptToolParams = Partial<JobDefinition> & {
  action: (typeof ACTIONS)[number];
  jobId?: string;
};

function json(payload: unknown) {
  return {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
    details: payload,
  };
}

function pickJobDefinition(raw: JobScriptToolParams): JobDefinition {
  const { action: _action, jobId: _jobId, ...rest } = raw;
  const defined = Object.fromEntries(
    Object.entries(rest).filter(([, value]) => value !== undefined),
  );
  return parseJobDefinition(defined);
}

export function buildJobScriptTool(params: {
  config?: JobScriptConfig;
  workDir: string;
  runner?: CommandRunner;
  scheduler?: SchedulerClient;
  logger?: JobScriptLogger;
}) {
  const config = params.config ?? parseJobScriptConfig(undefined);
  const workDir = path.resolve(params.workDir);
  const scheduler = params.scheduler ?? new SlurmScheduler({ config, runner: params.runner });
  const logger = params.logger ?? silentLogger;

  function jobFrom(raw: JobScriptToolParams) {
    return buildJobScript(pickJobDefinition(raw), { workDir, config, scheduler, logger });
  }

  return {
    name: "slurm_jobscript",
    label: "SLURM job script",
    description:
      "Render SLURM batch scripts from job steps, directives, dependencies and modules; submit them with sbatch and check their state with sacct.",
    parameters: JobScriptToolSchema,
    async execute(_toolCallId: string, raw: JobScriptToolParams) {
      switch (raw.action) {
        case "render": {
          const job = jobFrom(raw);
          return json({ scriptPath: job.scriptPath, script: job.render() });
        }

        case "write": {
          const job = jobFrom(raw);
          const script = await job.materialize();
          return json({ scriptPath: job.scriptPath, script });
        }

        case "submit": {
          const job = jobFrom(raw);
          await job.materialize();
          const jobId = await job.submit();
          return json({ jobId, scriptPath: job.scriptPath });
        }

        case "submit_and_cleanup": {
          const job = jobFrom(raw);
          const jobId = await job.submitAndCleanup();
          return json({ jobId, scriptPath: job.scriptPath, removed: true });
        }

        case "job_state": {
          const jobId = raw.jobId?.trim();
          if (!jobId) {
            throw new ConfigurationError("jobId is required", "jobId");
          }
          const state = await queryJobState(scheduler, jobId);
          const classification = classifyState(state);
          return json({
            jobId,
            state,
            classification,
            finished: classification === "finished",
          });
        }

        default:
          raw.action satisfies never;
          throw new Error(`Unsupported action: ${String(raw.action)}`);
      }
    },
  };
}

export type JobScriptTool = ReturnType<typeof buildJobScriptTool>;
