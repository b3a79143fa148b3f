export type SlurmDirective =
  | {
      kind: "space";
      key: string;
      args: string[];
    }
  | {
      kind: "equals";
      key: string;
      value?: string;
    };

export type JobScriptConfig = {
  shebang: string;
  directivePrefix: string;
  runPrefix: string;
  dependencyMode: string;
  submitCommand: string;
  submitArgs: string[];
  accountingCommand: string;
  commandTimeoutMs?: number;
};

export type JobScriptSnapshot = {
  shebang: string;
  directives: SlurmDirective[];
  dependencies: string[];
  dependencyMode: string;
  modules: string[];
  steps: string[];
};

export type JobStateClass = "unsubmitted" | "active" | "finished";

export type JobScriptLogger = {
  debug?: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export type SchedulerClient = {
  submit: (scriptPath: string) => Promise<string>;
  queryState: (jobId: string) => Promise<string>;
};

export type CommandResult = {
  code: number;
  stdout: string;
  stderr: string;
  /** Set when the runner killed the command after `timeoutMs`. */
  timedOut?: boolean;
};

export type CommandRunner = (
  command: string,
  args: string[],
  options?: { cwd?: string; timeoutMs?: number },
) => Promise<CommandResult>;
