/**
 * Drives the external port scanner (nmap by default) and turns its text
 * report into an ordered, duplicate-free list of open TCP ports.
 */

import { Logger } from "winston";
import { CommandRunner, runCommand } from "../commandRunner";
import { logger } from "../logger";

export type ScanErrorKind = "tool_missing" | "timeout" | "execution_failed";

export interface ScanError {
  kind: ScanErrorKind;
  message: string;
  stderr?: string;
}

export type ScanOutcome =
  | { ok: true; ports: number[] }
  | { ok: false; error: ScanError };

export interface ScanDriverOptions {
  tool: string;
  timeoutMs: number;
  runner?: CommandRunner;
}

const OPEN_PORT_LINE = /^(\d+)\/tcp\s+open\b/;

// Hostnames, IPv4 and IPv6 literals. A leading "-" would read as a flag.
const TARGET_PATTERN = /^[A-Za-z0-9_.:[\]%-]+$/;

export function isValidTarget(target: string): boolean {
  return (
    target.length > 0 &&
    target.length <= 253 &&
    !target.startsWith("-") &&
    TARGET_PATTERN.test(target)
  );
}

/**
 * Collect ports from lines like "22/tcp   open  ssh". Anything else,
 * including closed or filtered ports, is ignored.
 */
export function parseScanOutput(output: string): number[] {
  const seen = new Set<number>();
  const ports: number[] = [];
  for (const line of output.split(/\r?\n/)) {
    const match = OPEN_PORT_LINE.exec(line.trim());
    if (!match) {
      continue;
    }
    const port = parseInt(match[1], 10);
    if (port < 1 || port > 65535 || seen.has(port)) {
      continue;
    }
    seen.add(port);
    ports.push(port);
  }
  return ports;
}

export class ScanDriver {
  private readonly tool: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;

  constructor(options: ScanDriverOptions) {
    this.tool = options.tool;
    this.timeoutMs = options.timeoutMs;
    this.runner = options.runner ?? runCommand;
  }

  get toolName(): string {
    return this.tool;
  }

  /**
   * Full-range scan reporting open ports only
   */
  async scan(target: string, log: Logger = logger): Promise<ScanOutcome> {
    if (!isValidTarget(target)) {
      return {
        ok: false,
        error: {
          kind: "execution_failed",
          message: `Invalid scan target: ${target}`,
        },
      };
    }

    log.info("Starting port scan", { target, tool: this.tool });
    const result = await this.runner(this.tool, ["-p-", "--open", target], {
      timeoutMs: this.timeoutMs,
    });

    if (result.error === "not_found") {
      log.error("Scan tool not found", { tool: this.tool });
      return {
        ok: false,
        error: {
          kind: "tool_missing",
          message: `${this.tool} not found. Install it or set SCAN_TOOL.`,
        },
      };
    }

    if (result.error === "timeout") {
      log.error("Port scan timed out", {
        target,
        timeoutMs: this.timeoutMs,
      });
      return {
        ok: false,
        error: {
          kind: "timeout",
          message: `Scan timed out after ${Math.round(this.timeoutMs / 1000)}s`,
        },
      };
    }

    if (result.error !== undefined || result.exitCode !== 0) {
      const stderr = result.stderr.trim() || result.error || "";
      log.error("Port scan failed", {
        target,
        exitCode: result.exitCode,
        stderr,
      });
      return {
        ok: false,
        error: {
          kind: "execution_failed",
          message: stderr
            ? `${this.tool} failed: ${stderr}`
            : `${this.tool} exited with code ${result.exitCode}`,
          stderr,
        },
      };
    }

    const ports = parseScanOutput(result.stdout);
    log.info("Port scan finished", {
      target,
      openPorts: ports,
      count: ports.length,
    });
    return { ok: true, ports };
  }

  /**
   * Re-scan a single port after remediation. True when it no longer shows
   * as open; a failed scan counts as not verified.
   */
  async verifyPort(
    target: string,
    port: number,
    log: Logger = logger,
  ): Promise<boolean> {
    if (!isValidTarget(target)) {
      return false;
    }
    const result = await this.runner(this.tool, ["-p", String(port), target], {
      timeoutMs: this.timeoutMs,
    });
    if (result.error !== undefined || result.exitCode !== 0) {
      log.error("Verification scan failed", { target, port });
      return false;
    }
    const stillOpen = parseScanOutput(result.stdout).includes(port);
    if (stillOpen) {
      log.warn("Port still open after remediation", { target, port });
    } else {
      log.info("Port appears to be secured", { target, port });
    }
    return !stillOpen;
  }
}
