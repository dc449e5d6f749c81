import { describe, it, expect } from "vitest";
import { Vulnerability } from "../models/operation";
import {
  createInteractivePolicy,
  parseActionChoice,
  parseFailureChoice,
  Prompter,
} from "./prompts";

const vuln: Vulnerability = {
  port: 21,
  service: "FTP",
  description: "File Transfer Protocol - often unsecured",
  risk_level: "High",
  status: "detected",
};

function scripted(answers: string[]): Prompter & { asked: string[] } {
  const asked: string[] = [];
  return {
    asked,
    async question(query: string): Promise<string> {
      asked.push(query);
      const answer = answers.shift();
      if (answer === undefined) {
        throw new Error(`no answer left for ${query}`);
      }
      return answer;
    },
  };
}

describe("parseActionChoice", () => {
  it("accepts letters and words in any case", () => {
    expect(parseActionChoice("u")).toBe("update");
    expect(parseActionChoice(" Close ")).toBe("close");
    expect(parseActionChoice("ALL")).toBe("auto");
    expect(parseActionChoice("s")).toBe("skip");
    expect(parseActionChoice("later")).toBe("defer");
  });

  it("rejects anything else", () => {
    expect(parseActionChoice("")).toBeUndefined();
    expect(parseActionChoice("x")).toBeUndefined();
  });
});

describe("parseFailureChoice", () => {
  it("maps retry, skip and backup", () => {
    expect(parseFailureChoice("R")).toBe("retry");
    expect(parseFailureChoice("skip")).toBe("skip");
    expect(parseFailureChoice("b")).toBe("backup");
    expect(parseFailureChoice("u")).toBeUndefined();
  });
});

describe("createInteractivePolicy", () => {
  it("shows the port and returns the chosen action", async () => {
    const prompter = scripted(["c"]);
    const lines: string[] = [];
    const policy = createInteractivePolicy(prompter, (line) => lines.push(line));

    await expect(policy.chooseAction(vuln)).resolves.toBe("close");
    expect(lines).toContain("Port: 21");
    expect(lines).toContain("Risk: High");
    expect(prompter.asked).toEqual(["Choose action (u/c/a/s/r): "]);
  });

  it("asks again after an unrecognised answer", async () => {
    const prompter = scripted(["maybe", "a"]);
    const lines: string[] = [];
    const policy = createInteractivePolicy(prompter, (line) => lines.push(line));

    await expect(policy.chooseAction(vuln)).resolves.toBe("auto");
    expect(prompter.asked).toHaveLength(2);
    expect(lines.at(-1)).toBe(
      "Please enter 'u' for update, 'c' for close, 'a' for both, 's' for skip, or 'r' for retry later.",
    );
  });

  it("reports the failure before asking what to do", async () => {
    const prompter = scripted(["x", "s"]);
    const lines: string[] = [];
    const policy = createInteractivePolicy(prompter, (line) => lines.push(line));

    const choice = await policy.onFailure({
      vuln,
      action: "close",
      attempt: 1,
      maxAttempts: 3,
      message: "could not bind port 21",
    });

    expect(choice).toBe("skip");
    expect(lines).toContain("CLOSE FAILED (attempt 1/3)");
    expect(lines).toContain("Error: could not bind port 21");
    expect(lines.at(-1)).toBe("Please enter 'r' for retry, 's' for skip, or 'b' for backup.");
  });
});
