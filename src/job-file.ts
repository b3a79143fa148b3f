import fs from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { parse as parseYaml } from "yaml";
import { ConfigurationError } from "./errors.js";
import { JobScript } from "./job-script.js";
import type { JobScriptConfig, JobScriptLogger, SchedulerClient } from "./types.js";

export const JobDefinitionSchema = Type.Object(
  {
    command: Type.Optional(Type.String({ description: "First job step" })),
    commands: Type.Optional(
      Type.Array(Type.String(), { description: "Job steps in execution order" }),
    ),
    scriptName: Type.String({ minLength: 1, description: "Script file name inside the work dir" }),
    directives: Type.Optional(
      Type.Array(Type.String(), { description: "Raw directives, e.g. --mem=4g or -c 1" }),
    ),
    dependencies: Type.Optional(
      Type.Array(Type.Union([Type.String(), Type.Integer({ minimum: 0 })]), {
        description: "Job ids this job waits on",
      }),
    ),
    dependencyMode: Type.Optional(
      Type.String({ description: "Dependency type, e.g. afterany or afterok" }),
    ),
    modules: Type.Optional(Type.Array(Type.String(), { description: "Modules to load" })),
    shebang: Type.Optional(Type.String({ description: "Interpreter line" })),
  },
  { additionalProperties: false },
);

export type JobDefinition = Static<typeof JobDefinitionSchema>;

export function collectSteps(job: Pick<JobDefinition, "command" | "commands">): string[] {
  const merged = [
    ...(job.command ? [job.command] : []),
    ...(job.commands ?? []),
  ]
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  if (merged.length === 0) {
    throw new ConfigurationError("command or commands is required", "command");
  }
  return merged;
}

export function parseJobDefinition(value: unknown): JobDefinition {
  if (Value.Check(JobDefinitionSchema, value)) {
    collectSteps(value);
    return value;
  }
  const first = Value.Errors(JobDefinitionSchema, value).First();
  const field = first?.path.replace(/^\//, "").replace(/\//g, ".") || "job";
  throw new ConfigurationError(
    `Invalid job definition at ${field}: ${first?.message ?? "unknown error"}`,
    field,
  );
}

export async function loadJobFile(filePath: string): Promise<JobDefinition> {
  const raw = await fs.readFile(filePath, "utf8");
  let parsed: unknown;
  try {
    // YAML is a superset of JSON, so one parser covers both file types.
    parsed = parseYaml(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Unable to parse job file ${filePath}: ${detail}`, "job");
  }
  return parseJobDefinition(parsed);
}

export function buildJobScript(
  job: JobDefinition,
  params: {
    workDir: string;
    config: JobScriptConfig;
    scheduler?: SchedulerClient;
    logger?: JobScriptLogger;
  },
): JobScript {
  const [first, ...rest] = collectSteps(job);
  const script = new JobScript({
    command: first ?? "",
    scriptName: job.scriptName,
    directives: job.directives,
    dependencyMode: job.dependencyMode,
    workDir: params.workDir,
    config: params.config,
    scheduler: params.scheduler,
    logger: params.logger,
  });
  for (const step of rest) {
    script.addStep(step);
  }
  // Unquoted YAML job ids arrive as numbers.
  script.addDependencies((job.dependencies ?? []).map((jobId) => String(jobId)));
  script.addModules(job.modules ?? []);
  if (job.shebang) {
    script.setShebang(job.shebang);
  }
  return script;
}
