import { describe, it, expect } from "vitest";
import { CommandResult, describeFailure, runCommand, succeeded } from "./commandRunner";

function result(overrides: Partial<CommandResult>): CommandResult {
  return { command: "apt-get", args: [], exitCode: 0, stdout: "", stderr: "", ...overrides };
}

describe("succeeded", () => {
  it("requires exit 0 and no error", () => {
    expect(succeeded(result({}))).toBe(true);
    expect(succeeded(result({ exitCode: 100 }))).toBe(false);
    expect(succeeded(result({ exitCode: null, error: "timeout" }))).toBe(false);
  });
});

describe("describeFailure", () => {
  it("names missing and timed-out commands", () => {
    expect(describeFailure(result({ exitCode: null, error: "not_found" }))).toBe(
      "apt-get not found",
    );
    expect(describeFailure(result({ exitCode: null, error: "timeout" }))).toBe(
      "apt-get timed out",
    );
  });

  it("uses the first line of stderr, then stdout", () => {
    expect(
      describeFailure(result({ exitCode: 100, stderr: "E: lock held\nmore\n" })),
    ).toBe("exit 100: E: lock held");
    expect(describeFailure(result({ exitCode: 2, stdout: "usage\n" }))).toBe(
      "exit 2: usage",
    );
    expect(describeFailure(result({ exitCode: 3 }))).toBe("exit 3");
  });
});

describe("runCommand", () => {
  it("captures output and the exit code", async () => {
    const outcome = await runCommand(process.execPath, [
      "-e",
      "process.stdout.write('hi'); process.stderr.write('oops'); process.exit(3)",
    ]);

    expect(outcome.exitCode).toBe(3);
    expect(outcome.stdout).toBe("hi");
    expect(outcome.stderr).toBe("oops");
    expect(outcome.error).toBeUndefined();
  });

  it("resolves with not_found for a missing executable", async () => {
    const outcome = await runCommand("port-warden-no-such-binary", []);

    expect(outcome.exitCode).toBeNull();
    expect(outcome.error).toBe("not_found");
  });

  it("kills the child when the timeout passes", async () => {
    const outcome = await runCommand(
      process.execPath,
      ["-e", "setTimeout(() => {}, 10000)"],
      { timeoutMs: 200 },
    );

    expect(outcome.exitCode).toBeNull();
    expect(outcome.error).toBe("timeout");
  });
});
