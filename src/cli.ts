#!/usr/bin/env node
/**
 * Console sweep: scan, ask what to do about each flagged port, remediate,
 * verify. `--auto` answers every question with the automated policy.
 */

import readline from "readline/promises";
import { buildServices } from "./bootstrap";
import { config } from "./config";
import { createInteractivePolicy, Print } from "./cli/prompts";
import { formatSummary, parseCliArgs } from "./cli/summary";
import { errorMessage } from "./models/errors";
import { automatedPolicy } from "./services/decisionPolicy";
import { logger } from "./services/logger";
import { platformLabel } from "./services/remediation/platform";

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  const print: Print = (line) => process.stdout.write(`${line}\n`);
  const services = await buildServices(config);

  print("Port Warden sweep");
  print(`Target: ${args.target}`);
  print(`Platform: ${platformLabel(services.platform)}`);
  if (args.auto) {
    print("AUTOMATED MODE: every flagged port gets updates and closure");
  }
  if (!services.elevated) {
    print(
      "WARNING: not running with administrator/root privileges. Some tactics will be skipped.",
    );
  }

  const rl = args.auto
    ? undefined
    : readline.createInterface({ input: process.stdin, output: process.stdout });
  const policy = rl ? createInteractivePolicy(rl, print) : automatedPolicy;

  try {
    const report = await services.orchestrator.runSweep(args.target, policy);
    for (const line of formatSummary(report)) {
      print(line);
    }
    return report.scanError ? 1 : 0;
  } finally {
    rl?.close();
    // Placeholder listeners only guard ports while this process lives
    await services.binder.releaseAll();
  }
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((err) => {
      logger.error("Sweep failed", { error: errorMessage(err) });
      process.exit(1);
    });
}
