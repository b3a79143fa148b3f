import fs from "node:fs/promises";
import path from "node:path";
import { parseArgs } from "node:util";
import { parse as parseYaml } from "yaml";
import { parseJobScriptConfig } from "./config.js";
import { loadJobFile } from "./job-file.js";
import { LOG_PREFIX, createConsoleLogger } from "./logger.js";
import { buildJobScriptTool, type JobScriptToolParams } from "./tool.js";
import type { CommandRunner, JobScriptConfig, JobScriptLogger } from "./types.js";

const HELP = `
slurm-jobscript - build, submit and track SLURM batch scripts

Usage:
  slurm-jobscript render <job-file>          Print the rendered script
  slurm-jobscript write <job-file>           Write the script (mode 0755)
  slurm-jobscript submit <job-file> [--keep] Write, submit, then remove the script
  slurm-jobscript state <job-id>             Show the job's sacct state

Options:
  --config <file>   Settings file (YAML or JSON)
  --workdir <dir>   Directory scripts are written to (default: cwd)
  --keep            Keep the script after submitting
  --json            Print the full JSON result
  --verbose         Log debug messages
  --help            Show this help

Job files (YAML or JSON):
  scriptName: align.sh
  commands: ["bwa mem ref.fa reads.fq", "samtools sort out.bam"]
  directives: ["--mem=4g", "--time=20:00", "-c 1"]
  dependencies: ["1201"]
  dependencyMode: afterok
  modules: ["bwa/0.7", "samtools"]
`;

export type CliIO = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

async function loadConfig(configPath: string | undefined): Promise<JobScriptConfig> {
  if (!configPath) {
    return parseJobScriptConfig(undefined);
  }
  const raw = await fs.readFile(configPath, "utf8");
  return parseJobScriptConfig(parseYaml(raw));
}

function summarize(action: JobScriptToolParams["action"], details: Record<string, unknown>): string {
  switch (action) {
    case "render":
      return String(details.script ?? "");
    case "write":
      return `wrote ${String(details.scriptPath)}\n`;
    case "submit":
    case "submit_and_cleanup":
      return `${String(details.jobId)}\n`;
    case "job_state":
      return `${String(details.jobId)} ${String(details.state)} (${String(details.classification)})\n`;
    default:
      action satisfies never;
      return "";
  }
}

function asRecord(value: unknown): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
}

export async function runCli(
  argv: string[],
  options: { io?: CliIO; runner?: CommandRunner; logger?: JobScriptLogger; cwd?: string } = {},
): Promise<number> {
  const io = options.io ?? processIO;

  try {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        config: { type: "string" },
        workdir: { type: "string" },
        keep: { type: "boolean", default: false },
        json: { type: "boolean", default: false },
        verbose: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });

    const [command, target] = positionals;
    if (values.help || !command) {
      io.stdout(HELP);
      return 0;
    }

    const cwd = options.cwd ?? process.cwd();
    const config = await loadConfig(values.config && path.resolve(cwd, values.config));
    const tool = buildJobScriptTool({
      config,
      workDir: path.resolve(cwd, values.workdir ?? "."),
      runner: options.runner,
      logger: options.logger ?? createConsoleLogger({ verbose: values.verbose }),
    });

    let params: JobScriptToolParams;
    switch (command) {
      case "render":
      case "write":
      case "submit": {
        if (!target) {
          throw new Error(`${command} requires a job file`);
        }
        const job = await loadJobFile(path.resolve(cwd, target));
        const action: JobScriptToolParams["action"] =
          command === "submit" ? (values.keep ? "submit" : "submit_and_cleanup") : command;
        params = { ...job, action };
        break;
      }
      case "state":
        if (!target) {
          throw new Error("state requires a job id");
        }
        params = { action: "job_state", jobId: target };
        break;
      default:
        throw new Error(`Unknown command: ${command}\n${HELP}`);
    }

    const result = await tool.execute("cli", params);
    const details = asRecord(result.details);
    io.stdout(values.json ? `${JSON.stringify(details, null, 2)}\n` : summarize(params.action, details));
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr(`${LOG_PREFIX} error: ${message}\n`);
    return 1;
  }
}
