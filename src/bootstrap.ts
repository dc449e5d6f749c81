/**
 * Builds the service graph shared by the HTTP server and the CLI.
 */

import { AppConfig } from "./config";
import { loadCatalog, VulnerablePortCatalog } from "./models/catalog";
import { CommandRunner, runCommand } from "./services/commandRunner";
import { logger } from "./services/logger";
import { OperationRegistry } from "./services/operationRegistry";
import { Orchestrator } from "./services/orchestrator";
import { ProgressBroadcaster } from "./services/progressBroadcaster";
import {
  detectElevation,
  Platform,
  platformLabel,
  resolvePlatform,
} from "./services/remediation/platform";
import { PlaceholderBinder } from "./services/remediation/placeholderBinder";
import { RemediationService } from "./services/remediation/remediationService";
import { ScanDriver } from "./services/scan/scanDriver";

export interface Services {
  catalog: VulnerablePortCatalog;
  platform: Platform;
  elevated: boolean;
  runner: CommandRunner;
  binder: PlaceholderBinder;
  registry: OperationRegistry;
  broadcaster: ProgressBroadcaster;
  scanDriver: ScanDriver;
  remediation: RemediationService;
  orchestrator: Orchestrator;
}

export async function buildServices(
  cfg: AppConfig,
  runner: CommandRunner = runCommand,
): Promise<Services> {
  const catalog = loadCatalog(cfg.catalog.path);
  const platform = resolvePlatform(cfg.remediation.platform);
  const elevated = await detectElevation(platform, runner);

  logger.info("Remediation platform resolved", {
    platform: platformLabel(platform),
    elevated,
    catalogPorts: catalog.entries.size,
  });
  if (platform.kind === "unsupported") {
    logger.warn("Unsupported platform: only placeholder binding is available", {
      platform: platform.name,
    });
  }

  const binder = new PlaceholderBinder();
  const registry = new OperationRegistry();
  const broadcaster = new ProgressBroadcaster();
  const scanDriver = new ScanDriver({
    tool: cfg.scan.tool,
    timeoutMs: cfg.scan.timeoutMs,
    runner,
  });
  const remediation = new RemediationService({
    platform,
    catalog,
    elevated,
    commandTimeoutMs: cfg.remediation.commandTimeoutMs,
    runner,
    binder,
  });
  const orchestrator = new Orchestrator({
    registry,
    broadcaster,
    scanDriver,
    remediation,
    catalog,
    options: {
      maxAttempts: cfg.remediation.maxAttempts,
      verifyDelayMs: cfg.remediation.verifyDelayMs,
    },
  });

  return {
    catalog,
    platform,
    elevated,
    runner,
    binder,
    registry,
    broadcaster,
    scanDriver,
    remediation,
    orchestrator,
  };
}
