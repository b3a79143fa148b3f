export { JobScript, type JobScriptParams } from "./src/job-script.js";
export { DEFAULT_CONFIG, parseJobScriptConfig } from "./src/config.js";
export { formatDirective, parseDirective } from "./src/directives.js";
export {
  ConfigurationError,
  FilesystemError,
  JobScriptError,
  QueryError,
  SubmissionError,
  SubmissionParseError,
  type FilesystemOperation,
} from "./src/errors.js";
export { defaultCommandRunner } from "./src/exec.js";
export {
  JobDefinitionSchema,
  buildJobScript,
  loadJobFile,
  parseJobDefinition,
  type JobDefinition,
} from "./src/job-file.js";
export { createConsoleLogger, silentLogger } from "./src/logger.js";
export { SlurmScheduler, queryJobState, type SlurmSchedulerParams } from "./src/scheduler.js";
export {
  classifyState,
  isActiveState,
  parseAccountingState,
  parseSubmittedJobId,
  renderJobScript,
} from "./src/slurm.js";
export {
  JobScriptToolSchema,
  buildJobScriptTool,
  type JobScriptTool,
  type JobScriptToolParams,
} from "./src/tool.js";
export type {
  CommandResult,
  CommandRunner,
  JobScriptConfig,
  JobScriptLogger,
  JobScriptSnapshot,
  JobStateClass,
  SchedulerClient,
  SlurmDirective,
} from "./src/types.js";
