/**
 * Orchestrator: drives scan → classify → remediate → verify workflows and
 * keeps the registry and broadcaster in step.
 *
 * HTTP-triggered work runs as detached tasks; the caller only gets the
 * operation id back. Every state change goes to the registry first and is
 * then broadcast from the snapshot the registry returned.
 */

import { v4 as uuidv4 } from "uuid";
import { Logger } from "winston";
import { VulnerablePortCatalog } from "../models/catalog";
import {
  errorMessage,
  InvalidTransitionError,
  OperationNotFoundError,
} from "../models/errors";
import {
  isTerminal,
  Operation,
  OperationContext,
  OperationUpdate,
  RemediationAction,
  RemediationOutcome,
  ScanResult,
  ScanStatus,
  VerificationReport,
  Vulnerability,
} from "../models/operation";
import { classify, riskLevelFor } from "./classifier";
import {
  ActionChoice,
  automatedPolicy,
  DecisionPolicy,
} from "./decisionPolicy";
import { logger } from "./logger";
import { OperationRegistry } from "./operationRegistry";
import {
  ProgressBroadcaster,
  ProgressEvent,
  ProgressEventType,
} from "./progressBroadcaster";
import {
  RemediationPhase,
  RemediationService,
} from "./remediation/remediationService";
import { ScanDriver, ScanError } from "./scan/scanDriver";

export interface OrchestratorOptions {
  maxAttempts: number;
  verifyDelayMs: number;
}

export interface OrchestratorDeps {
  registry: OperationRegistry;
  broadcaster: ProgressBroadcaster;
  scanDriver: ScanDriver;
  remediation: RemediationService;
  catalog: VulnerablePortCatalog;
  options: OrchestratorOptions;
  logger?: Logger;
}

export interface PortReport {
  port: number;
  service: string;
  choice: ActionChoice;
  attempts: number;
  success: boolean;
  // null when nothing was attempted or the action failed
  secured: boolean | null;
  message: string;
  outcome?: RemediationOutcome;
}

export interface SweepReport {
  target: string;
  scan: ScanResult;
  scanError?: ScanError;
  ports: PortReport[];
  verification?: VerificationReport;
}

type ScanPhase =
  | { ok: true; result: ScanResult }
  | { ok: false; result: ScanResult; error: ScanError };

type Checkpoint = (progress: number, message: string) => void;

interface AttemptResult {
  outcome: RemediationOutcome;
  attempts: number;
}

const UPDATE_PHASE_PROGRESS = 20;
const CLOSE_PHASE_PROGRESS = 30;
const AUTO_CLOSE_PHASE_PROGRESS = 60;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function eventType(operation: Operation): ProgressEventType {
  const done = isTerminal(operation.status);
  if (operation.kind === "scan") {
    return done ? "scan_complete" : "scan_update";
  }
  return done ? "action_complete" : "action_update";
}

export function toProgressEvent(operation: Operation): ProgressEvent {
  const event: ProgressEvent = {
    type: eventType(operation),
    operation_id: operation.id,
    kind: operation.kind,
    status: operation.status,
    progress: operation.progress,
    message: operation.message,
    timestamp: operation.updated_at,
  };
  if (operation.result !== undefined) {
    event.result = operation.result;
  }
  if (operation.success !== undefined) {
    event.success = operation.success;
  }
  return event;
}

export class Orchestrator {
  private readonly registry: OperationRegistry;
  private readonly broadcaster: ProgressBroadcaster;
  private readonly scanDriver: ScanDriver;
  private readonly remediation: RemediationService;
  private readonly catalog: VulnerablePortCatalog;
  private readonly maxAttempts: number;
  private readonly verifyDelayMs: number;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly log: Logger;

  constructor(deps: OrchestratorDeps) {
    this.registry = deps.registry;
    this.broadcaster = deps.broadcaster;
    this.scanDriver = deps.scanDriver;
    this.remediation = deps.remediation;
    this.catalog = deps.catalog;
    this.maxAttempts = Math.max(1, deps.options.maxAttempts);
    this.verifyDelayMs = Math.max(0, deps.options.verifyDelayMs);
    this.log = deps.logger ?? logger;
  }

  // ---------------------------------------------------------------------
  // Operation entry points
  // ---------------------------------------------------------------------

  startScan(target: string, automatedMode: boolean): string {
    const operation = this.createOperation({
      kind: "scan",
      target,
      automated_mode: automatedMode,
    });
    this.log.info("Scan requested", {
      operationId: operation.id,
      target,
      automatedMode,
    });
    this.detach(operation.id, () =>
      this.runScanOperation(operation.id, target, automatedMode),
    );
    return operation.id;
  }

  executeAction(
    port: number,
    service: string,
    action: RemediationAction,
    parentId?: string,
  ): string {
    if (parentId !== undefined && !this.registry.get(parentId)) {
      throw new OperationNotFoundError(parentId);
    }
    const operation = this.createOperation(
      parentId === undefined
        ? { kind: "action", port, service, action }
        : { kind: "action", port, service, action, parent_id: parentId },
    );
    this.log.info("Remediation requested", {
      operationId: operation.id,
      port,
      action,
      parentId,
    });
    this.detach(operation.id, async () => {
      await this.runActionOperation(
        operation.id,
        this.vulnerabilityFor(port, service),
        action,
        automatedPolicy,
      );
    });
    return operation.id;
  }

  /**
   * Re-run `auto` remediation for a port of a failed operation. This is a
   * fresh attempt, not an undo of what the failed one changed.
   */
  rollback(operationId: string, port: number): string {
    const failed = this.registry.require(operationId);
    if (failed.status !== "failed") {
      throw new InvalidTransitionError(
        `Only failed operations can be rolled back (operation is ${failed.status})`,
      );
    }

    const service =
      failed.context.kind === "scan"
        ? (this.catalog.entries.get(port)?.service ?? "Unknown")
        : failed.context.service;

    const operation = this.createOperation({
      kind: "rollback",
      port,
      service,
      rollback_of: operationId,
    });
    this.log.info("Rollback requested", {
      operationId: operation.id,
      rollbackOf: operationId,
      port,
    });
    this.detach(operation.id, async () => {
      await this.runActionOperation(
        operation.id,
        this.vulnerabilityFor(port, service),
        "auto",
        automatedPolicy,
      );
    });
    return operation.id;
  }

  /**
   * The console workflow end to end, driven by a decision policy. Nothing
   * is recorded in the registry; progress goes to the log.
   */
  async runSweep(target: string, policy: DecisionPolicy): Promise<SweepReport> {
    this.log.info("Starting port security sweep", { target });
    const phase = await this.scanTarget(uuidv4(), target);
    if (!phase.ok) {
      this.log.error("Sweep aborted: scan failed", { error: phase.error.message });
      return {
        target,
        scan: phase.result,
        scanError: phase.error,
        ports: [],
      };
    }

    const flagged = phase.result.vulnerable_ports;
    if (flagged.length === 0) {
      this.log.info("No vulnerable ports detected", { target });
      return { target, scan: phase.result, ports: [] };
    }
    this.log.warn("Found potentially vulnerable ports", {
      count: flagged.length,
      ports: flagged.map((v) => v.port),
    });

    const ports: PortReport[] = [];
    for (const vuln of flagged) {
      ports.push(await this.sweepPort(target, vuln, policy));
    }

    const verification = await this.verifyTarget(target, flagged);
    return { target, scan: phase.result, ports, verification };
  }

  /**
   * Resolves once every detached task has settled. Used on shutdown and
   * by tests.
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  // ---------------------------------------------------------------------
  // Workflows
  // ---------------------------------------------------------------------

  private async runScanOperation(
    id: string,
    target: string,
    automatedMode: boolean,
  ): Promise<void> {
    this.transition(id, {
      status: "running",
      progress: 0,
      message: "Starting port scan...",
    });

    const log = this.log.child({ operationId: id });
    const phase = await this.scanTarget(
      id,
      target,
      (progress, message) =>
        this.transition(id, { status: "running", progress, message }),
      log,
    );

    if (!phase.ok) {
      this.transition(id, {
        status: "failed",
        progress: 0,
        message: `Scan failed: ${phase.error.message}`,
        result: phase.result,
        success: false,
      });
      return;
    }

    const result = phase.result;
    if (result.scan_status === "no_ports_found") {
      this.transition(id, {
        status: "completed",
        progress: 100,
        message: "Scan completed. No open ports found.",
        result,
        success: true,
      });
      return;
    }

    if (!automatedMode || result.vulnerable_count === 0) {
      this.transition(id, {
        status: "completed",
        progress: 100,
        message: `Scan completed. Found ${result.total_ports} open ports, ${result.vulnerable_count} vulnerable.`,
        result,
        success: true,
      });
      return;
    }

    const remediated = await this.remediateAll(id, result, automatedPolicy, log);
    const verification = remediated.verification;
    this.transition(id, {
      status: "completed",
      progress: 100,
      message: `Automated remediation finished. ${verification?.message ?? ""}`.trim(),
      result: remediated,
      // The run only counts as a success when the re-scan came back clean
      success:
        verification !== undefined &&
        !verification.scan_failed &&
        verification.persisting.length === 0,
    });
  }

  /**
   * Automated path: one child action operation per flagged port, run one
   * after another, then a verification scan. The scan operation stays
   * running throughout and moves from 75 to 95.
   */
  private async remediateAll(
    scanId: string,
    result: ScanResult,
    policy: DecisionPolicy,
    log: Logger,
  ): Promise<ScanResult> {
    const vulns = result.vulnerable_ports.map((v) => ({ ...v }));
    const total = vulns.length;

    for (const [index, vuln] of vulns.entries()) {
      this.transition(scanId, {
        status: "running",
        progress: 75 + Math.round((15 * index) / total),
        message: `Remediating port ${vuln.port} (${index + 1}/${total})...`,
      });

      const choice = await policy.chooseAction(vuln);
      if (choice === "skip" || choice === "defer") {
        log.info("Port left as is", { port: vuln.port, choice });
        continue;
      }

      vuln.status = "in_progress";
      const child = this.createOperation({
        kind: "action",
        port: vuln.port,
        service: vuln.service,
        action: choice,
        parent_id: scanId,
      });
      try {
        const outcome = await this.runActionOperation(
          child.id,
          vuln,
          choice,
          policy,
        );
        vuln.status = outcome.success ? "secured" : "failed";
      } catch (err) {
        // A fault in one port's remediation must not stop the others
        log.error("Remediation of port crashed", {
          childId: child.id,
          port: vuln.port,
          error: errorMessage(err),
        });
        vuln.status = "failed";
        this.failIfActive(child.id, `Internal error: ${errorMessage(err)}`);
      }

      this.transition(scanId, {
        status: "running",
        progress: 75 + Math.round((15 * (index + 1)) / total),
        message: `Processed port ${vuln.port} (${index + 1}/${total})`,
      });
    }

    this.transition(scanId, {
      status: "running",
      progress: 95,
      message: "Running verification scan...",
    });
    const verification = await this.verifyTarget(result.target, vulns, log);
    return { ...result, vulnerable_ports: vulns, verification };
  }

  private async runActionOperation(
    id: string,
    vuln: Vulnerability,
    action: RemediationAction,
    policy: DecisionPolicy,
  ): Promise<RemediationOutcome> {
    const { port, service } = vuln;
    const log = this.log.child({ operationId: id });
    this.trackAction(id, {
      status: "running",
      progress: 0,
      message: `Starting ${action} for port ${port}`,
    });

    const onPhase = (phase: RemediationPhase): void => {
      if (phase === "update") {
        this.trackAction(id, {
          status: "running",
          progress: UPDATE_PHASE_PROGRESS,
          message: `Applying security updates for port ${port}...`,
        });
      } else {
        this.trackAction(id, {
          status: "running",
          progress:
            action === "auto" ? AUTO_CLOSE_PHASE_PROGRESS : CLOSE_PHASE_PROGRESS,
          message: `Closing port ${port}...`,
        });
      }
    };

    const { outcome, attempts } = await this.attemptWithRetries(
      vuln,
      action,
      policy,
      () => this.remediation.remediate(port, service, action, { onPhase, log }),
      (attempt, previous) =>
        this.trackAction(id, {
          status: "running",
          progress: 0,
          message: `Attempt ${attempt - 1}/${this.maxAttempts} failed: ${previous.message}. Retrying...`,
        }),
    );

    if (outcome.success) {
      this.trackAction(id, {
        status: "completed",
        progress: 100,
        message: outcome.message,
        result: outcome,
        success: true,
      });
    } else {
      this.trackAction(id, {
        status: "failed",
        progress: 0,
        message: `${action} failed for port ${port} after ${attempts} attempt(s): ${outcome.message}`,
        result: outcome,
        success: false,
      });
    }
    return outcome;
  }

  private async sweepPort(
    target: string,
    vuln: Vulnerability,
    policy: DecisionPolicy,
  ): Promise<PortReport> {
    const base = { port: vuln.port, service: vuln.service };
    const choice = await policy.chooseAction(vuln);

    if (choice === "skip" || choice === "defer") {
      this.log.info("Port left as is", { port: vuln.port, choice });
      return {
        ...base,
        choice,
        attempts: 0,
        success: false,
        secured: null,
        message: choice === "skip" ? "Skipped" : "Deferred to a later run",
      };
    }

    const { outcome, attempts } = await this.attemptWithRetries(
      vuln,
      choice,
      policy,
      () => this.remediation.remediate(vuln.port, vuln.service, choice),
    );

    if (!outcome.success) {
      this.log.error("Remediation failed", {
        port: vuln.port,
        action: choice,
        attempts,
        message: outcome.message,
      });
      return {
        ...base,
        choice,
        attempts,
        success: false,
        secured: null,
        message: outcome.message,
        outcome,
      };
    }

    const secured = await this.verifyPort(target, vuln.port);
    return {
      ...base,
      choice,
      attempts,
      success: true,
      secured,
      message: outcome.message,
      outcome,
    };
  }

  /**
   * Run one remediation, asking the policy after each failure whether to
   * go again. Never more than maxAttempts runs.
   */
  private async attemptWithRetries(
    vuln: Vulnerability,
    action: RemediationAction,
    policy: DecisionPolicy,
    runOnce: () => Promise<RemediationOutcome>,
    onRetry?: (attempt: number, previous: RemediationOutcome) => void,
  ): Promise<AttemptResult> {
    let attempts = 1;
    let outcome = await runOnce();

    while (!outcome.success && attempts < this.maxAttempts) {
      const decision = await policy.onFailure({
        vuln,
        action,
        attempt: attempts,
        maxAttempts: this.maxAttempts,
        message: outcome.message,
      });
      if (decision !== "retry") {
        if (decision === "backup") {
          this.log.info("Keeping current state for port", { port: vuln.port });
        }
        break;
      }
      attempts += 1;
      onRetry?.(attempts, outcome);
      outcome = await runOnce();
    }

    return { outcome, attempts };
  }

  // ---------------------------------------------------------------------
  // Scanning helpers
  // ---------------------------------------------------------------------

  private async scanTarget(
    scanId: string,
    target: string,
    checkpoint: Checkpoint = () => undefined,
    log: Logger = this.log,
  ): Promise<ScanPhase> {
    checkpoint(25, `Scanning ${target} with ${this.scanDriver.toolName}...`);
    const outcome = await this.scanDriver.scan(target, log);
    if (!outcome.ok) {
      return {
        ok: false,
        error: outcome.error,
        result: this.scanResult(scanId, target, [], [], "failed"),
      };
    }

    const ports = outcome.ports;
    checkpoint(
      50,
      `Found ${ports.length} open ports. Analyzing vulnerabilities...`,
    );
    const flagged = classify(ports, this.catalog);
    checkpoint(75, `Found ${flagged.length} vulnerable ports`);

    return {
      ok: true,
      result: this.scanResult(
        scanId,
        target,
        ports,
        flagged,
        ports.length > 0 ? "succeeded" : "no_ports_found",
      ),
    };
  }

  private scanResult(
    scanId: string,
    target: string,
    openPorts: number[],
    flagged: Vulnerability[],
    status: ScanStatus,
  ): ScanResult {
    return {
      scan_id: scanId,
      target,
      open_ports: openPorts,
      vulnerable_ports: flagged,
      scan_status: status,
      timestamp: new Date().toISOString(),
      total_ports: openPorts.length,
      vulnerable_count: flagged.length,
    };
  }

  private async verifyPort(target: string, port: number): Promise<boolean> {
    if (this.verifyDelayMs > 0) {
      await sleep(this.verifyDelayMs);
    }
    return this.scanDriver.verifyPort(target, port);
  }

  /**
   * Final full re-scan: which catalog ports are still open, and which of
   * the ports remediated in this run no longer are.
   */
  private async verifyTarget(
    target: string,
    remediated: Vulnerability[],
    log: Logger = this.log,
  ): Promise<VerificationReport> {
    log.info("Running final verification scan", { target });
    const outcome = await this.scanDriver.scan(target, log);
    const timestamp = new Date().toISOString();

    if (!outcome.ok) {
      log.error("Verification scan failed", { error: outcome.error.message });
      return {
        open_ports: [],
        persisting: [],
        secured_ports: [],
        scan_failed: true,
        message: `Verification scan failed: ${outcome.error.message}`,
        timestamp,
      };
    }

    const persisting = classify(outcome.ports, this.catalog);
    const stillOpen = new Set(outcome.ports);
    const securedPorts = remediated
      .map((v) => v.port)
      .filter((port) => !stillOpen.has(port));

    if (persisting.length > 0) {
      log.warn("Vulnerable ports still open after remediation", {
        ports: persisting.map((v) => v.port),
      });
    } else {
      log.info("Final scan found no vulnerable ports", { target });
    }

    return {
      open_ports: outcome.ports,
      persisting,
      secured_ports: securedPorts,
      scan_failed: false,
      message:
        persisting.length > 0
          ? `${persisting.length} vulnerable ports still open`
          : "No vulnerable ports detected",
      timestamp,
    };
  }

  // ---------------------------------------------------------------------
  // Registry plumbing
  // ---------------------------------------------------------------------

  private vulnerabilityFor(port: number, service: string): Vulnerability {
    return {
      port,
      service,
      description: this.catalog.entries.get(port)?.description ?? "",
      risk_level: riskLevelFor(port, this.catalog),
      status: "detected",
    };
  }

  private createOperation(context: OperationContext): Operation {
    const operation = this.registry.create(context);
    this.broadcaster.publish(toProgressEvent(operation));
    return operation;
  }

  private transition(id: string, update: OperationUpdate): Operation {
    const operation = this.registry.update(id, update);
    this.broadcaster.publish(toProgressEvent(operation));
    return operation;
  }

  /**
   * Like transition, but an action operation deleted mid-run only stops
   * being reported: the remediation itself carries on.
   */
  private trackAction(id: string, update: OperationUpdate): void {
    try {
      this.transition(id, update);
    } catch (err) {
      if (!(err instanceof OperationNotFoundError)) {
        throw err;
      }
      this.log.warn("Operation removed while running", {
        operationId: id,
        status: update.status,
      });
    }
  }

  private detach(id: string, task: () => Promise<void>): void {
    const running: Promise<void> = task()
      .catch((err) => {
        this.log.error("Background operation crashed", {
          operationId: id,
          error: errorMessage(err),
        });
        this.failIfActive(id, `Internal error: ${errorMessage(err)}`);
      })
      .finally(() => {
        this.inFlight.delete(running);
      });
    this.inFlight.add(running);
  }

  private failIfActive(id: string, message: string): void {
    const operation = this.registry.get(id);
    if (!operation || isTerminal(operation.status)) {
      return;
    }
    try {
      this.transition(id, {
        status: "failed",
        progress: 0,
        message,
        success: false,
      });
    } catch (err) {
      this.log.error("Could not mark operation failed", {
        operationId: id,
        error: errorMessage(err),
      });
    }
  }
}
