/**
 * Decision points of the remediation workflow. The console supplies an
 * interactive policy; the HTTP service and `--auto` use automatedPolicy.
 */

import { RemediationAction, Vulnerability } from "../models/operation";

/** `defer` leaves the port for a later run; it is reported, not retried */
export type ActionChoice = RemediationAction | "skip" | "defer";

export type FailureChoice = "retry" | "skip" | "backup";

export interface FailureContext {
  vuln: Vulnerability;
  action: RemediationAction;
  attempt: number;
  maxAttempts: number;
  message: string;
}

export interface DecisionPolicy {
  chooseAction(vuln: Vulnerability): Promise<ActionChoice>;
  onFailure(failure: FailureContext): Promise<FailureChoice>;
}

export const automatedPolicy: DecisionPolicy = {
  async chooseAction() {
    return "auto";
  },
  async onFailure() {
    return "retry";
  },
};
