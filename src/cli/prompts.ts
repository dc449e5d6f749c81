/**
 * Interactive decision policy for the console sweep.
 */

import { Vulnerability } from "../models/operation";
import {
  ActionChoice,
  DecisionPolicy,
  FailureChoice,
  FailureContext,
} from "../services/decisionPolicy";

/** The slice of readline/promises' Interface the prompts use */
export interface Prompter {
  question(query: string): Promise<string>;
}

export type Print = (line: string) => void;

const RULE = "=".repeat(60);

const ACTION_ANSWERS: Record<string, ActionChoice> = {
  u: "update",
  update: "update",
  c: "close",
  close: "close",
  a: "auto",
  auto: "auto",
  all: "auto",
  s: "skip",
  skip: "skip",
  r: "defer",
  retry: "defer",
  later: "defer",
};

const FAILURE_ANSWERS: Record<string, FailureChoice> = {
  r: "retry",
  retry: "retry",
  s: "skip",
  skip: "skip",
  b: "backup",
  backup: "backup",
};

export function parseActionChoice(answer: string): ActionChoice | undefined {
  return ACTION_ANSWERS[answer.trim().toLowerCase()];
}

export function parseFailureChoice(answer: string): FailureChoice | undefined {
  return FAILURE_ANSWERS[answer.trim().toLowerCase()];
}

async function ask<T>(
  prompter: Prompter,
  print: Print,
  query: string,
  parse: (answer: string) => T | undefined,
  help: string,
): Promise<T> {
  for (;;) {
    const choice = parse(await prompter.question(query));
    if (choice !== undefined) {
      return choice;
    }
    print(help);
  }
}

export function createInteractivePolicy(
  prompter: Prompter,
  print: Print,
): DecisionPolicy {
  return {
    async chooseAction(vuln: Vulnerability): Promise<ActionChoice> {
      print("");
      print(RULE);
      print("VULNERABLE PORT DETECTED");
      print(RULE);
      print(`Port: ${vuln.port}`);
      print(`Service: ${vuln.service}`);
      print(`Risk: ${vuln.risk_level}`);
      print(`Description: ${vuln.description}`);
      print("");
      print("1. Apply security updates from official sources (u)");
      print("2. Close/block the port using every available method (c)");
      print("3. Apply updates AND close the port (a)");
      print("4. Skip this port (s)");
      print("5. Retry later (r)");
      return ask(
        prompter,
        print,
        "Choose action (u/c/a/s/r): ",
        parseActionChoice,
        "Please enter 'u' for update, 'c' for close, 'a' for both, 's' for skip, or 'r' for retry later.",
      );
    },

    async onFailure(failure: FailureContext): Promise<FailureChoice> {
      print("");
      print(RULE);
      print(`${failure.action.toUpperCase()} FAILED (attempt ${failure.attempt}/${failure.maxAttempts})`);
      print(RULE);
      print(`Port: ${failure.vuln.port}`);
      print(`Service: ${failure.vuln.service}`);
      print(`Error: ${failure.message}`);
      return ask(
        prompter,
        print,
        "Would you like to (r)etry, (s)kip, or (b)ackup current state? ",
        parseFailureChoice,
        "Please enter 'r' for retry, 's' for skip, or 'b' for backup.",
      );
    },
  };
}
