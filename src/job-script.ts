import fs from "node:fs/promises";
import { DEFAULT_CONFIG } from "./config.js";
import {
  normalizeDependency,
  normalizeDependencyMode,
  normalizeModule,
  normalizeStep,
  parseDirective,
  readLine,
} from "./directives.js";
import { FilesystemError, toErrorText } from "./errors.js";
import { LOG_PREFIX, silentLogger } from "./logger.js";
import { resolveScriptPath } from "./paths.js";
import { SlurmScheduler, queryJobState } from "./scheduler.js";
import { isActiveState, parseSubmittedJobId, renderJobScript } from "./slurm.js";
import type {
  JobScriptConfig,
  JobScriptLogger,
  JobScriptSnapshot,
  SchedulerClient,
  SlurmDirective,
} from "./types.js";

const SCRIPT_MODE = 0o755;

export type JobScriptParams = {
  /** First job step; `srun` (the run prefix) is prepended when rendering. */
  command: string;
  /** File name of the script, resolved against `workDir`. */
  scriptName: string;
  /** Raw directives, e.g. `["--mem=4g", "--time=20:00", "-c 1"]`. */
  directives?: string[];
  dependencyMode?: string;
  workDir?: string;
  config?: JobScriptConfig;
  scheduler?: SchedulerClient;
  logger?: JobScriptLogger;
};

/**
 * A single SLURM batch job: accumulates steps, directives, dependencies and
 * modules, renders them to a script, submits it and reports its state.
 */
export class JobScript {
  readonly scriptPath: string;

  private readonly config: JobScriptConfig;
  private readonly scheduler: SchedulerClient;
  private readonly logger: JobScriptLogger;

  private readonly stepList: string[];
  private readonly directiveList: SlurmDirective[] = [];
  private readonly dependencyList: string[] = [];
  private readonly moduleList: string[] = [];
  private mode: string;
  private shebangLine: string;
  private submittedJobId: string | undefined;

  constructor(params: JobScriptParams) {
    this.config = params.config ?? { ...DEFAULT_CONFIG, submitArgs: [] };
    this.scheduler = params.scheduler ?? new SlurmScheduler({ config: this.config });
    this.logger = params.logger ?? silentLogger;

    this.stepList = [normalizeStep(params.command)];
    this.scriptPath = resolveScriptPath(params.workDir ?? process.cwd(), params.scriptName);
    for (const raw of params.directives ?? []) {
      this.addDirective(raw);
    }
    this.mode = normalizeDependencyMode(params.dependencyMode ?? this.config.dependencyMode);
    this.shebangLine = readLine(this.config.shebang, "shebang");
  }

  get steps(): string[] {
    return [...this.stepList];
  }

  get directives(): SlurmDirective[] {
    return this.directiveList.map((directive) =>
      directive.kind === "space" ? { ...directive, args: [...directive.args] } : { ...directive },
    );
  }

  get dependencies(): string[] {
    return [...this.dependencyList];
  }

  get dependencyMode(): string {
    return this.mode;
  }

  get modules(): string[] {
    return [...this.moduleList];
  }

  get shebang(): string {
    return this.shebangLine;
  }

  get jobId(): string | undefined {
    return this.submittedJobId;
  }

  addStep(command: string): this {
    this.stepList.push(normalizeStep(command));
    return this;
  }

  addDirective(raw: string): this {
    this.directiveList.push(parseDirective(raw));
    return this;
  }

  addDependency(jobId: string): this {
    this.dependencyList.push(normalizeDependency(jobId));
    return this;
  }

  addDependencies(jobIds: string[]): this {
    // A bad entry leaves the list untouched.
    const normalized = jobIds.map((jobId) => normalizeDependency(jobId));
    this.dependencyList.push(...normalized);
    return this;
  }

  setDependencyMode(mode: string): this {
    this.mode = normalizeDependencyMode(mode);
    return this;
  }

  addModule(name: string): this {
    this.moduleList.push(normalizeModule(name));
    return this;
  }

  addModules(names: string[]): this {
    const normalized = names.map((name) => normalizeModule(name));
    this.moduleList.push(...normalized);
    return this;
  }

  setShebang(line: string): this {
    this.shebangLine = readLine(line, "shebang");
    return this;
  }

  snapshot(): JobScriptSnapshot {
    return {
      shebang: this.shebangLine,
      directives: this.directives,
      dependencies: this.dependencies,
      dependencyMode: this.mode,
      modules: this.modules,
      steps: this.steps,
    };
  }

  render(): string {
    return renderJobScript({
      job: this.snapshot(),
      directivePrefix: this.config.directivePrefix,
      runPrefix: this.config.runPrefix,
    });
  }

  /** Writes the rendered script to `scriptPath` and marks it executable (0755). */
  async materialize(): Promise<string> {
    const script = this.render();
    try {
      await fs.writeFile(this.scriptPath, script, "utf8");
    } catch (error) {
      throw new FilesystemError("write", this.scriptPath, error);
    }
    try {
      await fs.chmod(this.scriptPath, SCRIPT_MODE);
    } catch (error) {
      throw new FilesystemError("chmod", this.scriptPath, error);
    }
    this.logger.debug?.(`${LOG_PREFIX} wrote ${this.scriptPath}`);
    return script;
  }

  async submit(): Promise<string> {
    const output = await this.scheduler.submit(this.scriptPath);
    const jobId = parseSubmittedJobId(output);
    this.submittedJobId = jobId;
    this.logger.info(`${LOG_PREFIX} submitted job ${jobId} (${this.scriptPath})`);
    return jobId;
  }

  /**
   * Writes, submits and then deletes the script. sbatch copies the script at
   * acceptance time, so the job id stays valid after the file is gone.
   */
  async submitAndCleanup(): Promise<string> {
    let jobId: string;
    try {
      await this.materialize();
      jobId = await this.submit();
    } catch (error) {
      await this.removeScript().catch((cleanupError: unknown) => {
        this.logger.warn(
          `${LOG_PREFIX} could not remove ${this.scriptPath} after failed submit: ${toErrorText(cleanupError)}`,
        );
      });
      throw error;
    }
    await this.removeScript();
    return jobId;
  }

  async getStateCode(): Promise<string | undefined> {
    if (!this.submittedJobId) {
      return undefined;
    }
    return await queryJobState(this.scheduler, this.submittedJobId);
  }

  /** True once SLURM reports anything other than PENDING or RUNNING. */
  async isFinished(): Promise<boolean> {
    const state = await this.getStateCode();
    if (state === undefined) {
      return false;
    }
    return !isActiveState(state);
  }

  private async removeScript(): Promise<void> {
    try {
      await fs.unlink(this.scriptPath);
    } catch (error) {
      throw new FilesystemError("remove", this.scriptPath, error);
    }
    this.logger.debug?.(`${LOG_PREFIX} removed ${this.scriptPath}`);
  }
}
