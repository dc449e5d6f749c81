/**
 * Host status: privilege level, platform and (on Windows) firewall state
 * GET /system/status
 */

import { Request, Response } from "express";
import { CommandRunner, succeeded } from "../services/commandRunner";
import { logger } from "../services/logger";
import { Platform, platformLabel } from "../services/remediation/platform";
import { sendFailure } from "./respond";

export interface SystemInfo {
  platform: Platform;
  elevated: boolean;
  runner: CommandRunner;
}

/**
 * null when the platform offers no check we know how to run
 */
export async function firewallEnabled(info: SystemInfo): Promise<boolean | null> {
  if (info.platform.kind !== "windows") {
    return null;
  }
  const result = await info.runner(
    "netsh",
    ["advfirewall", "show", "allprofiles", "state"],
    { timeoutMs: 10_000 },
  );
  if (!succeeded(result)) {
    logger.warn("Could not read firewall state", { stderr: result.stderr });
    return false;
  }
  return result.stdout.includes("ON") && !result.stdout.includes("OFF");
}

export function createSystemController(info: SystemInfo) {
  async function getSystemStatus(req: Request, res: Response): Promise<void> {
    try {
      res.json({
        admin_privileges: info.elevated,
        operating_system: platformLabel(info.platform),
        firewall_enabled: await firewallEnabled(info),
        timestamp: new Date().toISOString(),
      });
    } catch (err) {
      sendFailure(res, err, "get system status");
    }
  }

  return { getSystemStatus };
}
