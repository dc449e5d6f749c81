/**
 * Argument parsing and the end-of-run report for the console sweep
 */

import { parseArgs } from "util";
import { PortReport, SweepReport } from "../services/orchestrator";

export const DEFAULT_TARGET = "127.0.0.1";

export interface CliArgs {
  auto: boolean;
  target: string;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      auto: { type: "boolean", short: "a", default: false },
      target: { type: "string", short: "t", default: DEFAULT_TARGET },
    },
    strict: true,
  });
  return {
    auto: values.auto === true,
    target: values.target ?? DEFAULT_TARGET,
  };
}

function describePort(report: PortReport): string {
  const head = `  - Port ${report.port} (${report.service}): `;
  if (report.choice === "skip") {
    return `${head}skipped`;
  }
  if (report.choice === "defer") {
    return `${head}deferred`;
  }
  if (!report.success) {
    return `${head}${report.choice} failed after ${report.attempts} attempt(s)`;
  }
  return `${head}${report.choice} succeeded, ${
    report.secured ? "secured" : "may still be vulnerable"
  }`;
}

export function formatSummary(report: SweepReport): string[] {
  const rule = "=".repeat(60);
  const lines = [rule, `SWEEP SUMMARY: ${report.target}`, rule];

  if (report.scanError) {
    lines.push(`Scan failed: ${report.scanError.message}`);
    return lines;
  }

  lines.push(`Open ports: ${report.scan.total_ports}`);
  lines.push(`Vulnerable ports: ${report.scan.vulnerable_count}`);
  for (const port of report.ports) {
    lines.push(describePort(port));
  }

  const verification = report.verification;
  if (verification) {
    lines.push(`Final scan: ${verification.message}`);
    for (const vuln of verification.persisting) {
      lines.push(`  - Port ${vuln.port}: ${vuln.service}`);
    }
  } else if (report.scan.vulnerable_count === 0) {
    lines.push("No vulnerable ports detected. System appears secure.");
  }
  return lines;
}
