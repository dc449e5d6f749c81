/**
 * Remediation strategy selector.
 *
 * Picks the strategy table for the platform chosen at startup and runs the
 * update, close or auto strategy for one port. Nothing in here throws on a
 * failed command: each tactic reports a TacticResult and the outcome
 * aggregates them.
 */

import { Logger } from "winston";
import { VulnerablePortCatalog } from "../../models/catalog";
import {
  RemediationAction,
  RemediationOutcome,
  TacticResult,
} from "../../models/operation";
import { CommandRunner, runCommand } from "../commandRunner";
import { logger } from "../logger";
import { linuxStrategy } from "./linux";
import { PlaceholderBinder } from "./placeholderBinder";
import { Platform, platformLabel } from "./platform";
import {
  fail,
  placeholderBindTactic,
  PlatformStrategy,
  runTactic,
  Tactic,
  TacticContext,
} from "./tactics";
import { windowsStrategy } from "./windows";

export type RemediationPhase = "update" | "close";

export type PhaseListener = (phase: RemediationPhase) => void;

export interface RemediateOptions {
  onPhase?: PhaseListener;
  /** Child logger tagged with the operation being run */
  log?: Logger;
}

export interface RemediationServiceOptions {
  platform: Platform;
  catalog: VulnerablePortCatalog;
  elevated: boolean;
  commandTimeoutMs: number;
  runner?: CommandRunner;
  binder?: PlaceholderBinder;
}

const STRATEGIES: Record<"linux" | "windows", PlatformStrategy> = {
  linux: linuxStrategy,
  windows: windowsStrategy,
};

function anySucceeded(tactics: TacticResult[]): boolean {
  return tactics.some((t) => t.success && !t.advisory);
}

export class RemediationService {
  readonly platform: Platform;
  readonly elevated: boolean;
  private readonly strategy: PlatformStrategy | null;
  private readonly catalog: VulnerablePortCatalog;
  private readonly runner: CommandRunner;
  private readonly commandTimeoutMs: number;
  readonly binder: PlaceholderBinder;

  constructor(options: RemediationServiceOptions) {
    this.platform = options.platform;
    this.elevated = options.elevated;
    this.catalog = options.catalog;
    this.commandTimeoutMs = options.commandTimeoutMs;
    this.runner = options.runner ?? runCommand;
    this.binder = options.binder ?? new PlaceholderBinder();
    this.strategy =
      options.platform.kind === "unsupported"
        ? null
        : STRATEGIES[options.platform.kind];
  }

  private context(port: number, service: string, log: Logger): TacticContext {
    return {
      port,
      service,
      elevated: this.elevated,
      runner: this.runner,
      commandTimeoutMs: this.commandTimeoutMs,
      catalog: this.catalog,
      binder: this.binder,
      log,
    };
  }

  async remediate(
    port: number,
    service: string,
    action: RemediationAction,
    options: RemediateOptions = {},
  ): Promise<RemediationOutcome> {
    const { onPhase, log = logger } = options;
    log.info("Remediation started", {
      port,
      service,
      action,
      platform: platformLabel(this.platform),
    });

    let outcome: RemediationOutcome;
    if (action === "update") {
      onPhase?.("update");
      outcome = await this.update(port, service, log);
    } else if (action === "close") {
      onPhase?.("close");
      outcome = await this.close(port, service, log);
    } else {
      onPhase?.("update");
      const updated = await this.update(port, service, log);
      onPhase?.("close");
      const closed = await this.close(port, service, log);
      outcome = {
        action: "auto",
        port,
        service,
        tactics: [...updated.tactics, ...closed.tactics],
        success: updated.success || closed.success,
        message: `Update: ${updated.message}, Close: ${closed.message}`,
      };
    }

    log.info("Remediation finished", {
      port,
      action,
      success: outcome.success,
      tactics: outcome.tactics.map((t) => `${t.tactic}:${t.success}`),
    });
    return outcome;
  }

  /**
   * Update strategy: package-specific when the platform table knows the
   * port, otherwise a generic "apply pending security updates"
   */
  async update(
    port: number,
    service: string,
    log: Logger = logger,
  ): Promise<RemediationOutcome> {
    const strategy = this.strategy;
    if (!strategy) {
      const result = fail(
        "package-update",
        `Unsupported operating system: ${platformLabel(this.platform)}`,
      );
      return this.outcome("update", port, service, [result], result.message);
    }

    const ctx = this.context(port, service, log);
    const packageName = strategy.packageFor(port, this.catalog);

    if (!packageName) {
      log.info("No package mapping for port, applying generic updates", {
        port,
        service,
      });
      const generic = await runTactic(
        { name: "generic-update", run: (c) => strategy.applyGenericUpdate(c) },
        ctx,
      );
      return this.outcome("update", port, service, [generic], generic.message);
    }

    // Advisory only: a failed check never blocks the apply step
    const verify = await runTactic(
      {
        name: "verify-update",
        run: (c) => strategy.verifyUpdate(c, packageName),
      },
      ctx,
    );
    if (!verify.success) {
      log.warn("No official patch confirmed, applying anyway", {
        port,
        packageName,
        detail: verify.message,
      });
    }

    const apply = await runTactic(
      {
        name: "package-update",
        run: (c) => strategy.applyPackageUpdate(c, packageName),
      },
      ctx,
    );
    return this.outcome(
      "update",
      port,
      service,
      [{ ...verify, advisory: true }, apply],
      apply.message,
    );
  }

  /**
   * Close strategy: every tactic runs, whatever the earlier ones did
   */
  async close(
    port: number,
    service: string,
    log: Logger = logger,
  ): Promise<RemediationOutcome> {
    const tactics: Tactic[] = this.strategy
      ? this.strategy.closeTactics
      : [placeholderBindTactic];

    const ctx = this.context(port, service, log);
    const results: TacticResult[] = [];
    for (const tactic of tactics) {
      results.push(await runTactic(tactic, ctx));
    }

    const succeededMessages = results
      .filter((r) => r.success)
      .map((r) => r.message);

    let message: string;
    if (succeededMessages.length > 0) {
      message = `Port ${port} closed using: ${succeededMessages.join(", ")}`;
    } else if (!this.strategy) {
      message = `Failed to close port ${port}: unsupported operating system ${platformLabel(this.platform)}`;
    } else {
      message = `Failed to close port ${port} using any method. ${
        this.platform.kind === "windows" ? "Admin" : "Root"
      } privileges may be required for full functionality.`;
    }

    return this.outcome("close", port, service, results, message);
  }

  private outcome(
    action: RemediationAction,
    port: number,
    service: string,
    tactics: TacticResult[],
    message: string,
  ): RemediationOutcome {
    return {
      action,
      port,
      service,
      tactics,
      success: anySucceeded(tactics),
      message,
    };
  }
}
