/**
 * Process boundary for the scan tool and every remediation command.
 *
 * A command never rejects: spawn faults and timeouts come back as a
 * CommandResult with a null exit code and an `error` reason.
 */

import { spawn } from "child_process";

export interface CommandResult {
  command: string;
  args: string[];
  exitCode: number | null;
  stdout: string;
  stderr: string;
  error?: "not_found" | "timeout" | string;
}

export interface CommandOptions {
  timeoutMs?: number;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

const DEFAULT_TIMEOUT_MS = 600_000;

export function succeeded(result: CommandResult): boolean {
  return result.exitCode === 0 && result.error === undefined;
}

/**
 * First useful line of diagnostics for log and outcome messages
 */
export function describeFailure(result: CommandResult): string {
  if (result.error === "not_found") {
    return `${result.command} not found`;
  }
  if (result.error === "timeout") {
    return `${result.command} timed out`;
  }
  if (result.error) {
    return result.error;
  }
  const detail = (result.stderr || result.stdout).trim().split("\n")[0];
  return detail
    ? `exit ${result.exitCode}: ${detail}`
    : `exit ${result.exitCode}`;
}

export const runCommand: CommandRunner = (command, args, options = {}) => {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return new Promise((resolve) => {
    let child: ReturnType<typeof spawn>;
    try {
      child = spawn(command, args, {
        stdio: ["ignore", "pipe", "pipe"],
        windowsHide: true,
        shell: false,
      });
    } catch (err) {
      resolve({
        command,
        args,
        exitCode: null,
        stdout: "",
        stderr: "",
        error: err instanceof Error ? err.message : String(err),
      });
      return;
    }

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    child.stdout?.on("data", (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => stderrChunks.push(chunk));

    let timedOut = false;
    let settled = false;
    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, timeoutMs);

    const finish = (exitCode: number | null, error?: string) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      resolve({
        command,
        args,
        exitCode,
        stdout: Buffer.concat(stdoutChunks).toString("utf8"),
        stderr: Buffer.concat(stderrChunks).toString("utf8"),
        ...(error !== undefined ? { error } : {}),
      });
    };

    child.on("error", (err: NodeJS.ErrnoException) => {
      finish(null, err.code === "ENOENT" ? "not_found" : err.message);
    });

    child.on("close", (code) => {
      finish(timedOut ? null : code, timedOut ? "timeout" : undefined);
    });
  });
};
