/**
 * Target platform for remediation, chosen once at startup. Each variant has
 * its own strategy table (see linux.ts and windows.ts).
 */

import { CommandRunner } from "../commandRunner";
import { logger } from "../logger";

export type Platform =
  | { kind: "linux" }
  | { kind: "windows" }
  | { kind: "unsupported"; name: string };

export type PlatformKind = Platform["kind"];

/**
 * Map an explicit override or a Node platform string to a variant
 */
export function resolvePlatform(
  override: string,
  nodePlatform: string = process.platform,
): Platform {
  const name = (override || nodePlatform).toLowerCase();
  if (name === "linux") {
    return { kind: "linux" };
  }
  if (name === "windows" || name === "win32") {
    return { kind: "windows" };
  }
  return { kind: "unsupported", name };
}

export function platformLabel(platform: Platform): string {
  return platform.kind === "unsupported" ? platform.name : platform.kind;
}

/**
 * Whether the process runs with administrator/root rights. On Windows,
 * `net session` only succeeds from an elevated shell.
 */
export async function detectElevation(
  platform: Platform,
  runner: CommandRunner,
): Promise<boolean> {
  if (platform.kind === "windows") {
    const result = await runner("net", ["session"], { timeoutMs: 10_000 });
    return result.exitCode === 0;
  }
  if (typeof process.getuid === "function") {
    return process.getuid() === 0;
  }
  logger.warn("Could not determine privilege level", {
    platform: platformLabel(platform),
  });
  return false;
}
