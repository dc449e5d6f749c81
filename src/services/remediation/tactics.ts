/**
 * Tactic plumbing shared by the platform strategy tables.
 *
 * A tactic is one concrete remediation attempt. Whatever happens inside
 * it, the caller gets a TacticResult back; a thrown fault becomes a failed
 * result so sibling tactics still run.
 */

import { Logger } from "winston";
import { VulnerablePortCatalog } from "../../models/catalog";
import { errorMessage } from "../../models/errors";
import { TacticResult } from "../../models/operation";
import {
  CommandResult,
  CommandRunner,
  describeFailure,
  succeeded,
} from "../commandRunner";
import { PlaceholderBinder } from "./placeholderBinder";
import { PlatformKind } from "./platform";

export interface TacticContext {
  port: number;
  service: string;
  elevated: boolean;
  runner: CommandRunner;
  commandTimeoutMs: number;
  catalog: VulnerablePortCatalog;
  binder: PlaceholderBinder;
  /** Carries the operation id when one is running */
  log: Logger;
}

export interface Tactic {
  name: string;
  run(ctx: TacticContext): Promise<TacticResult>;
}

export interface PlatformStrategy {
  platform: PlatformKind;
  packageFor(port: number, catalog: VulnerablePortCatalog): string | undefined;
  /** Advisory: is an update published for the package? */
  verifyUpdate(ctx: TacticContext, packageName: string): Promise<TacticResult>;
  applyPackageUpdate(
    ctx: TacticContext,
    packageName: string,
  ): Promise<TacticResult>;
  applyGenericUpdate(ctx: TacticContext): Promise<TacticResult>;
  closeTactics: Tactic[];
}

export function ok(tactic: string, message: string): TacticResult {
  return { tactic, success: true, skipped: false, message };
}

export function fail(tactic: string, message: string): TacticResult {
  return { tactic, success: false, skipped: false, message };
}

export function skip(tactic: string, message: string): TacticResult {
  return { tactic, success: false, skipped: true, message };
}

/**
 * Run one command with the tactic timeout and log non-zero exits
 */
export async function exec(
  ctx: TacticContext,
  command: string,
  args: string[],
): Promise<CommandResult> {
  const result = await ctx.runner(command, args, {
    timeoutMs: ctx.commandTimeoutMs,
  });
  if (!succeeded(result)) {
    ctx.log.debug("Command failed", {
      command,
      args,
      port: ctx.port,
      reason: describeFailure(result),
    });
  }
  return result;
}

/**
 * Try the unprivileged form first, then the sudo form. Returns which one
 * worked, or null.
 */
export async function execWithEscalation(
  ctx: TacticContext,
  command: string,
  args: string[],
): Promise<"plain" | "sudo" | null> {
  const plain = await exec(ctx, command, args);
  if (succeeded(plain)) {
    return "plain";
  }
  const elevated = await exec(ctx, "sudo", ["-n", command, ...args]);
  return succeeded(elevated) ? "sudo" : null;
}

export async function runTactic(
  tactic: Tactic,
  ctx: TacticContext,
): Promise<TacticResult> {
  try {
    const result = await tactic.run(ctx);
    ctx.log.info("Tactic finished", {
      tactic: tactic.name,
      port: ctx.port,
      success: result.success,
      skipped: result.skipped,
      detail: result.message,
    });
    return result;
  } catch (err) {
    ctx.log.warn("Tactic raised a fault", {
      tactic: tactic.name,
      port: ctx.port,
      error: errorMessage(err),
    });
    return fail(tactic.name, `Exception in ${tactic.name}: ${errorMessage(err)}`);
  }
}

/**
 * Placeholder listener on the port. Shared by every platform.
 */
export const placeholderBindTactic: Tactic = {
  name: "placeholder-bind",
  async run(ctx) {
    const outcome = await ctx.binder.bind(ctx.port);
    switch (outcome.state) {
      case "bound":
        return ok("placeholder-bind", "bound port to prevent usage");
      case "held":
        return ok("placeholder-bind", "port already held by placeholder");
      case "in_use":
        return ok(
          "placeholder-bind",
          "port already in use, preventing other applications from using it",
        );
      default:
        return fail(
          "placeholder-bind",
          `could not bind port ${ctx.port}: ${outcome.reason}`,
        );
    }
  },
};
