import { describe, expect, it } from "vitest";
import { parseDirective } from "./directives.js";
import { QueryError, SubmissionParseError } from "./errors.js";
import {
  classifyState,
  isActiveState,
  parseAccountingState,
  parseSubmittedJobId,
  renderJobScript,
} from "./slurm.js";
import type { JobScriptSnapshot } from "./types.js";

function snapshot(overrides: Partial<JobScriptSnapshot> = {}): JobScriptSnapshot {
  return {
    shebang: "#!/bin/bash",
    directives: [],
    dependencies: [],
    dependencyMode: "afterany",
    modules: [],
    steps: ["hostname"],
    ...overrides,
  };
}

describe("slurm rendering", () => {
  it("renders shebang, directives, dependency line, modules and steps in order", () => {
    const script = renderJobScript({
      job: snapshot({
        directives: [parseDirective("--mem=4g"), parseDirective("-c 1")],
        dependencies: ["100", "101"],
        dependencyMode: "afterok",
        modules: ["python/3.11"],
        steps: ["python3 prep.py", "python3 train.py"],
      }),
      directivePrefix: "#SBATCH ",
      runPrefix: "srun ",
    });

    expect(script).toBe(
      [
        "#!/bin/bash",
        "#SBATCH --mem=4g",
        "#SBATCH -c 1",
        "#SBATCH --dependency=afterok:100,101",
        "module load python/3.11",
        "srun python3 prep.py",
        "srun python3 train.py",
        "",
      ].join("\n"),
    );
  });

  it("omits the dependency line when there are no dependencies", () => {
    const script = renderJobScript({
      job: snapshot(),
      directivePrefix: "#SBATCH ",
      runPrefix: "srun ",
    });
    expect(script).toBe("#!/bin/bash\nsrun hostname\n");
  });

  it("uses configured prefixes verbatim", () => {
    const script = renderJobScript({
      job: snapshot({ directives: [parseDirective("--time=5")] }),
      directivePrefix: "#PBS-like ",
      runPrefix: "",
    });
    expect(script).toBe("#!/bin/bash\n#PBS-like --time=5\nhostname\n");
  });

  it("refuses to render without steps", () => {
    expect(() =>
      renderJobScript({ job: snapshot({ steps: [] }), directivePrefix: "", runPrefix: "" }),
    ).toThrow(/At least one job step/);
  });
});

describe("job id parsing", () => {
  it("parses standard sbatch output", () => {
    expect(parseSubmittedJobId("Submitted batch job 98765\n")).toBe("98765");
  });

  it("accepts the federated cluster suffix", () => {
    expect(parseSubmittedJobId("Submitted batch job 4242 on cluster gpu")).toBe("4242");
  });

  it("rejects output that does not follow the sbatch layout", () => {
    expect(() => parseSubmittedJobId("job 777777 accepted")).toThrow(SubmissionParseError);
    expect(() => parseSubmittedJobId("Submitted batch job")).toThrow(SubmissionParseError);
    expect(() => parseSubmittedJobId("Submitted batch job abc")).toThrow(
      "Unable to parse job id from sbatch output: Submitted batch job abc",
    );
    expect(() => parseSubmittedJobId("")).toThrow(/<empty>/);
  });
});

describe("accounting state parsing", () => {
  it("reads the second pipe-delimited field", () => {
    expect(parseAccountingState("12345", "12345|RUNNING|\n")).toBe("RUNNING");
    expect(parseAccountingState("12345", "\n12345|COMPLETED|0:0|\n")).toBe("COMPLETED");
    expect(parseAccountingState("12345", "12345|CANCELLED by 0|0:0|")).toBe("CANCELLED by 0");
  });

  it("fails on empty or malformed output", () => {
    expect(() => parseAccountingState("12345", "")).toThrow(QueryError);
    expect(() => parseAccountingState("12345", "12345")).toThrow(/Unexpected sacct output/);
    expect(() => parseAccountingState("12345", "12345||")).toThrow(QueryError);
  });

  it("classifies pending and running as active, everything else as finished", () => {
    expect(isActiveState("PENDING")).toBe(true);
    expect(isActiveState("RUNNING")).toBe(true);
    expect(classifyState(undefined)).toBe("unsubmitted");
    expect(classifyState("RUNNING")).toBe("active");
    expect(classifyState("COMPLETED")).toBe("finished");
    expect(classifyState("FAILED")).toBe("finished");
    expect(classifyState("TIMEOUT")).toBe("finished");
  });
});
