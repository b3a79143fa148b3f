import { describe, expect, it } from "vitest";
import { QueryError } from "./errors.js";
import { defaultCommandRunner, runChecked } from "./exec.js";

const node = process.execPath;

describe("default command runner", () => {
  it("captures stdout, stderr and the exit code", async () => {
    const result = await defaultCommandRunner(node, [
      "-e",
      "process.stdout.write('Submitted batch job 7'); process.stderr.write('warn'); process.exit(3)",
    ]);

    expect(result).toEqual({ code: 3, stdout: "Submitted batch job 7", stderr: "warn" });
  });

  it("runs in the requested directory", async () => {
    const cwd = process.platform === "win32" ? process.cwd() : "/";
    const result = await defaultCommandRunner(node, ["-e", "process.stdout.write(process.cwd())"], {
      cwd,
    });
    expect(result.code).toBe(0);
    expect(result.stdout).toBe(cwd);
  });

  it("kills and flags commands that exceed the timeout", async () => {
    const result = await defaultCommandRunner(node, ["-e", "setTimeout(() => {}, 10000)"], {
      timeoutMs: 100,
    });
    expect(result.timedOut).toBe(true);
    expect(result.code).toBe(1);
  });

  it("rejects when the command cannot be spawned", async () => {
    await expect(
      defaultCommandRunner("/nonexistent/slurm-jobscript-missing-binary", []),
    ).rejects.toThrow(/ENOENT/);
  });
});

describe("runChecked", () => {
  const fail = (message: string, cause?: unknown) =>
    new QueryError(message, { jobId: "42", cause });

  it("returns successful results", async () => {
    const result = await runChecked(
      defaultCommandRunner,
      node,
      ["-e", "process.stdout.write('42|RUNNING|')"],
      undefined,
      fail,
    );
    expect(result.stdout).toBe("42|RUNNING|");
  });

  it("reports a timeout distinctly from a failed exit", async () => {
    const runner = async () => ({ code: 1, stdout: "", stderr: "", timedOut: true });
    await expect(runChecked(runner, "sacct", [], { timeoutMs: 250 }, fail)).rejects.toThrow(
      "sacct timed out after 250ms",
    );
    await expect(
      runChecked(async () => ({ code: 1, stdout: "", stderr: "" }), "sacct", [], undefined, fail),
    ).rejects.toThrow("sacct failed: exit code 1");
  });

  it("times out a real child process through the error factory", async () => {
    await expect(
      runChecked(defaultCommandRunner, node, ["-e", "setTimeout(() => {}, 10000)"], { timeoutMs: 100 }, fail),
    ).rejects.toThrow(/timed out after 100ms$/);
  });

  it("wraps spawn failures with their cause", async () => {
    await expect(
      runChecked(defaultCommandRunner, "/nonexistent/slurm-jobscript-missing-binary", [], undefined, fail),
    ).rejects.toMatchObject({ jobId: "42", cause: expect.any(Error) });
  });
});
