import { describe, it, expect } from "vitest";
import { fakeRunner, nmapOutput } from "../../testing/fakes";
import { isValidTarget, parseScanOutput, ScanDriver } from "./scanDriver";

describe("parseScanOutput", () => {
  it("keeps open tcp ports in report order without duplicates", () => {
    const output = [
      "PORT     STATE    SERVICE",
      "22/tcp   open     ssh",
      "80/tcp   filtered http",
      "  443/tcp open  https",
      "22/tcp   open     ssh",
      "53/udp   open     domain",
      "8080/tcp closed   http-proxy",
    ].join("\n");

    expect(parseScanOutput(output)).toEqual([22, 443]);
  });

  it("handles CRLF output and an empty report", () => {
    expect(parseScanOutput("21/tcp open ftp\r\n3389/tcp open ms-wbt-server\r\n")).toEqual([
      21, 3389,
    ]);
    expect(parseScanOutput("")).toEqual([]);
  });

  it("ignores port numbers out of range", () => {
    expect(parseScanOutput("0/tcp open x\n70000/tcp open y\n")).toEqual([]);
  });
});

describe("isValidTarget", () => {
  it("accepts hostnames and address literals", () => {
    expect(isValidTarget("127.0.0.1")).toBe(true);
    expect(isValidTarget("db-01")).toBe(true);
    expect(isValidTarget("localhost")).toBe(true);
    expect(isValidTarget("::1")).toBe(true);
  });

  it("rejects anything that could read as a flag or shell text", () => {
    expect(isValidTarget("-oX")).toBe(false);
    expect(isValidTarget("host; rm -rf /")).toBe(false);
    expect(isValidTarget("")).toBe(false);
  });
});

describe("ScanDriver.scan", () => {
  it("runs a full-range open-port scan and parses the result", async () => {
    const fake = fakeRunner((line) =>
      line === "nmap -p- --open 127.0.0.1"
        ? { stdout: nmapOutput([21, 22, 80]) }
        : undefined,
    );
    const driver = new ScanDriver({ tool: "nmap", timeoutMs: 5000, runner: fake.runner });

    expect(await driver.scan("127.0.0.1")).toEqual({ ok: true, ports: [21, 22, 80] });
    expect(fake.calls).toEqual(["nmap -p- --open 127.0.0.1"]);
  });

  it("reports a missing tool", async () => {
    const fake = fakeRunner(() => ({ exitCode: null, error: "not_found" }));
    const driver = new ScanDriver({ tool: "nmap", timeoutMs: 5000, runner: fake.runner });

    expect(await driver.scan("127.0.0.1")).toEqual({
      ok: false,
      error: {
        kind: "tool_missing",
        message: "nmap not found. Install it or set SCAN_TOOL.",
      },
    });
  });

  it("reports a timeout", async () => {
    const fake = fakeRunner(() => ({ exitCode: null, error: "timeout" }));
    const driver = new ScanDriver({ tool: "nmap", timeoutMs: 90_000, runner: fake.runner });

    const outcome = await driver.scan("127.0.0.1");
    expect(outcome).toEqual({
      ok: false,
      error: { kind: "timeout", message: "Scan timed out after 90s" },
    });
  });

  it("reports a non-zero exit with the tool's stderr", async () => {
    const fake = fakeRunner(() => ({ exitCode: 1, stderr: "Failed to resolve host\n" }));
    const driver = new ScanDriver({ tool: "nmap", timeoutMs: 5000, runner: fake.runner });

    expect(await driver.scan("nohost")).toEqual({
      ok: false,
      error: {
        kind: "execution_failed",
        message: "nmap failed: Failed to resolve host",
        stderr: "Failed to resolve host",
      },
    });
  });

  it("refuses an invalid target without running anything", async () => {
    const fake = fakeRunner();
    const driver = new ScanDriver({ tool: "nmap", timeoutMs: 5000, runner: fake.runner });

    const outcome = await driver.scan("--script=evil");
    expect(outcome).toEqual({
      ok: false,
      error: { kind: "execution_failed", message: "Invalid scan target: --script=evil" },
    });
    expect(fake.calls).toEqual([]);
  });
});

describe("ScanDriver.verifyPort", () => {
  it("is true once the port no longer shows as open", async () => {
    const fake = fakeRunner((line) =>
      line === "nmap -p 21 127.0.0.1" ? { stdout: "21/tcp closed ftp\n" } : undefined,
    );
    const driver = new ScanDriver({ tool: "nmap", timeoutMs: 5000, runner: fake.runner });

    expect(await driver.verifyPort("127.0.0.1", 21)).toBe(true);
  });

  it("is false while the port is still open", async () => {
    const fake = fakeRunner(() => ({ stdout: "21/tcp open ftp\n" }));
    const driver = new ScanDriver({ tool: "nmap", timeoutMs: 5000, runner: fake.runner });

    expect(await driver.verifyPort("127.0.0.1", 21)).toBe(false);
  });

  it("is false when the verification scan fails", async () => {
    const fake = fakeRunner();
    const driver = new ScanDriver({ tool: "nmap", timeoutMs: 5000, runner: fake.runner });

    expect(await driver.verifyPort("127.0.0.1", 21)).toBe(false);
  });
});
