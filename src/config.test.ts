import { describe, expect, it } from "vitest";
import { parseJobScriptConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";

describe("slurm-jobscript config", () => {
  it("returns defaults for empty config", () => {
    const cfg = parseJobScriptConfig(undefined);
    expect(cfg).toEqual({
      shebang: "#!/bin/bash",
      directivePrefix: "#SBATCH ",
      runPrefix: "srun ",
      dependencyMode: "afterany",
      submitCommand: "sbatch",
      submitArgs: [],
      accountingCommand: "sacct",
    });
  });

  it("parses overrides and keeps prefix whitespace", () => {
    const cfg = parseJobScriptConfig({
      shebang: " #!/bin/bash -l ",
      runPrefix: "srun --mpi=pmix ",
      dependencyMode: "afterok",
      submitCommand: "/opt/slurm/bin/sbatch",
      submitArgs: ["--requeue", " ", "--export=NONE"],
      commandTimeoutMs: 1500.7,
    });

    expect(cfg.shebang).toBe("#!/bin/bash -l");
    expect(cfg.directivePrefix).toBe("#SBATCH ");
    expect(cfg.runPrefix).toBe("srun --mpi=pmix ");
    expect(cfg.dependencyMode).toBe("afterok");
    expect(cfg.submitCommand).toBe("/opt/slurm/bin/sbatch");
    expect(cfg.submitArgs).toEqual(["--requeue", "--export=NONE"]);
    expect(cfg.accountingCommand).toBe("sacct");
    expect(cfg.commandTimeoutMs).toBe(1500);
  });

  it("names the offending field", () => {
    try {
      parseJobScriptConfig({ submitArgs: "--export=NONE" });
      expect.unreachable("expected parseJobScriptConfig to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ field: "submitArgs" });
    }
  });

  it("rejects malformed values", () => {
    expect(() => parseJobScriptConfig([])).toThrow(/must be an object/);
    expect(() => parseJobScriptConfig({ commandTimeoutMs: 0 })).toThrow(
      "commandTimeoutMs must be a positive number",
    );
    expect(() => parseJobScriptConfig({ dependencyMode: "after:ok" })).toThrow(
      /dependencyMode is malformed/,
    );
    expect(() => parseJobScriptConfig({ directivePrefix: "#SBATCH\n" })).toThrow(/line breaks/);
  });
});
