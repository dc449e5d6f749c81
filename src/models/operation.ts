/**
 * Operation models: the tracked units of asynchronous work (scans,
 * remediation actions and rollbacks) and the payloads they produce.
 */

// Operation lifecycle: pending -> running -> completed | failed
export type OperationStatus = "pending" | "running" | "completed" | "failed";

export type OperationKind = "scan" | "action" | "rollback";

export const OPERATION_STATUSES: readonly OperationStatus[] = [
  "pending",
  "running",
  "completed",
  "failed",
];

export const OPERATION_KINDS: readonly OperationKind[] = [
  "scan",
  "action",
  "rollback",
];

export type RemediationAction = "update" | "close" | "auto";

export const REMEDIATION_ACTIONS: readonly RemediationAction[] = [
  "update",
  "close",
  "auto",
];

export type RiskLevel = "High" | "Medium";

// Display-only tag; orchestration never branches on it
export type VulnerabilityStatus =
  | "detected"
  | "in_progress"
  | "secured"
  | "failed";

export interface Vulnerability {
  port: number;
  service: string;
  description: string;
  risk_level: RiskLevel;
  status: VulnerabilityStatus;
}

export type ScanStatus = "succeeded" | "no_ports_found" | "failed";

export interface VerificationReport {
  open_ports: number[];
  persisting: Vulnerability[];
  secured_ports: number[];
  scan_failed: boolean;
  message: string;
  timestamp: string;
}

export interface ScanResult {
  scan_id: string;
  target: string;
  open_ports: number[];
  vulnerable_ports: Vulnerability[];
  scan_status: ScanStatus;
  timestamp: string;
  total_ports: number;
  vulnerable_count: number;
  verification?: VerificationReport;
}

export interface TacticResult {
  tactic: string;
  success: boolean;
  // Preconditions not met (e.g. no elevated privilege); not a failure
  skipped: boolean;
  // Informational check; never counts toward the outcome's success
  advisory?: boolean;
  message: string;
}

export interface RemediationOutcome {
  action: RemediationAction;
  port: number;
  service: string;
  tactics: TacticResult[];
  success: boolean;
  message: string;
}

export type OperationContext =
  | { kind: "scan"; target: string; automated_mode: boolean }
  | {
      kind: "action";
      port: number;
      service: string;
      action: RemediationAction;
      parent_id?: string;
    }
  | { kind: "rollback"; port: number; service: string; rollback_of: string };

export type OperationResult = ScanResult | RemediationOutcome;

export interface Operation {
  id: string;
  kind: OperationKind;
  status: OperationStatus;
  progress: number; // 0-100, never decreases
  message: string;
  context: OperationContext;
  result?: OperationResult;
  success?: boolean;
  created_at: string;
  updated_at: string;
}

export interface OperationUpdate {
  status: OperationStatus;
  progress: number;
  message: string;
  result?: OperationResult;
  success?: boolean;
}

// Status helpers
export const TERMINAL_STATUSES: OperationStatus[] = ["completed", "failed"];
export const ROLLBACKABLE_STATUSES: OperationStatus[] = ["failed"];

const STATUS_ORDER: Record<OperationStatus, number> = {
  pending: 0,
  running: 1,
  completed: 2,
  failed: 2,
};

export function isTerminal(status: OperationStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Whether an operation in `from` may move to `to`. Repeating `running`
 * is allowed so progress checkpoints can be recorded.
 */
export function canTransition(
  from: OperationStatus,
  to: OperationStatus,
): boolean {
  if (isTerminal(from)) {
    return false;
  }
  return STATUS_ORDER[to] >= STATUS_ORDER[from];
}

export function isOperationStatus(value: unknown): value is OperationStatus {
  return OPERATION_STATUSES.some((status) => status === value);
}

export function isOperationKind(value: unknown): value is OperationKind {
  return OPERATION_KINDS.some((kind) => kind === value);
}

export function isRemediationAction(
  value: unknown,
): value is RemediationAction {
  return REMEDIATION_ACTIONS.some((action) => action === value);
}

export function isScanResult(
  result: OperationResult | undefined,
): result is ScanResult {
  return result !== undefined && "scan_id" in result;
}
