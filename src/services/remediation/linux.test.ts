import { describe, it, expect } from "vitest";
import { FakeBinder, fakeRunner, Responder, testCatalog } from "../../testing/fakes";
import { logger } from "../logger";
import { linuxStrategy, parseLinuxListeners } from "./linux";
import { runTactic, TacticContext } from "./tactics";

const NETSTAT = [
  "Active Internet connections (only servers)",
  "Proto Recv-Q Send-Q Local Address           Foreign Address         State       PID/Program name",
  "tcp        0      0 0.0.0.0:21              0.0.0.0:*               LISTEN      812/vsftpd",
  "tcp        0      0 127.0.0.1:2121          0.0.0.0:*               LISTEN      900/other",
  "tcp6       0      0 :::21                   :::*                    LISTEN      812/vsftpd",
  "tcp        0      0 0.0.0.0:22              0.0.0.0:*               LISTEN      -",
  "udp        0      0 0.0.0.0:21              0.0.0.0:*                           77/udpthing",
].join("\n");

function context(respond: Responder, overrides: Partial<TacticContext> = {}) {
  const fake = fakeRunner(respond);
  const ctx: TacticContext = {
    port: 21,
    service: "FTP",
    elevated: false,
    runner: fake.runner,
    commandTimeoutMs: 1000,
    catalog: testCatalog(),
    binder: new FakeBinder(),
    log: logger,
    ...overrides,
  };
  return { ctx, calls: fake.calls };
}

function tactic(name: string) {
  const found = linuxStrategy.closeTactics.find((t) => t.name === name);
  if (!found) {
    throw new Error(`no tactic ${name}`);
  }
  return found;
}

describe("parseLinuxListeners", () => {
  it("finds listening pids for the exact port", () => {
    expect(parseLinuxListeners(NETSTAT, 21)).toEqual(["812"]);
    expect(parseLinuxListeners(NETSTAT, 2121)).toEqual(["900"]);
  });

  it("skips rows without a pid", () => {
    expect(parseLinuxListeners(NETSTAT, 22)).toEqual([]);
  });
});

describe("linux close tactics", () => {
  it("falls back to the system service manager through sudo", async () => {
    const { ctx, calls } = context((line) =>
      line === "sudo -n systemctl stop vsftpd" ? {} : undefined,
    );

    const result = await runTactic(tactic("stop-service"), ctx);

    expect(result.message).toBe("stopped system service vsftpd");
    expect(calls).toEqual([
      "systemctl --user stop vsftpd",
      "sudo -n systemctl stop vsftpd",
      "sudo -n systemctl disable vsftpd",
    ]);
  });

  it("uses the requested service name when the catalog has none", async () => {
    const { ctx, calls } = context(() => undefined, { port: 22, service: "sshd" });

    const result = await runTactic(tactic("stop-service"), ctx);

    expect(result.success).toBe(false);
    expect(calls[0]).toBe("systemctl --user stop sshd");
  });

  it("kills listeners, escalating when the plain kill is refused", async () => {
    const { ctx } = context((line) => {
      if (line === "netstat -tulpn") return { stdout: NETSTAT };
      if (line === "sudo -n kill -9 812") return {};
      return undefined;
    });

    const result = await runTactic(tactic("kill-processes"), ctx);

    expect(result).toEqual({
      tactic: "kill-processes",
      success: true,
      skipped: false,
      message: "killed process 812 (with sudo)",
    });
  });

  it("never signals its own process", async () => {
    const own = String(process.pid);
    const { ctx, calls } = context((line) =>
      line === "netstat -tulpn"
        ? { stdout: `tcp 0 0 127.0.0.1:21 0.0.0.0:* LISTEN ${own}/node` }
        : undefined,
    );

    const result = await runTactic(tactic("kill-processes"), ctx);

    expect(result.message).toBe("no process listening on port 21");
    expect(calls).toEqual(["netstat -tulpn"]);
  });

  it("skips fuser while the placeholder holds the port", async () => {
    const binder = new FakeBinder();
    binder.heldPorts = () => [21];
    const { ctx, calls } = context(() => ({}), { binder });

    const result = await runTactic(tactic("signal-fallback"), ctx);

    expect(result.skipped).toBe(true);
    expect(calls).toEqual([]);
  });

  it("adds a DROP rule only with root", async () => {
    const unprivileged = context(() => ({}));
    expect((await runTactic(tactic("packet-filter"), unprivileged.ctx)).skipped).toBe(true);
    expect(unprivileged.calls).toEqual([]);

    const root = context(() => ({}), { elevated: true });
    const result = await runTactic(tactic("packet-filter"), root.ctx);
    expect(result.message).toBe("blocked with iptables");
    expect(root.calls).toEqual(["iptables -A INPUT -p tcp --dport 21 -j DROP"]);
  });
});

describe("linux update tactics", () => {
  it("reports an available update from the upgradable list", async () => {
    const { ctx } = context((line) => {
      if (line === "sudo -n apt-get update") return {};
      if (line === "apt list --upgradable") return { stdout: "vsftpd/stable 3.0.5 amd64 [upgradable from: 3.0.3]" };
      return undefined;
    });

    const result = await linuxStrategy.verifyUpdate(ctx, "vsftpd");

    expect(result.message).toBe("Updates available from official repository");
  });

  it("looks up packages in the linux table", () => {
    const catalog = testCatalog();
    expect(linuxStrategy.packageFor(22, catalog)).toBe("openssh-server");
    expect(linuxStrategy.packageFor(445, catalog)).toBeUndefined();
  });
});
