/**
 * Linux strategy table: apt for updates; systemd, kill/fuser and iptables
 * for closing a port.
 */

import { describeFailure, succeeded } from "../commandRunner";
import {
  exec,
  execWithEscalation,
  fail,
  ok,
  placeholderBindTactic,
  PlatformStrategy,
  skip,
  Tactic,
  TacticContext,
} from "./tactics";

/**
 * PIDs listening on the port in `netstat -tulpn` output. The local address
 * is the fourth column and the "PID/program" pair the seventh.
 */
export function parseLinuxListeners(output: string, port: number): string[] {
  const pids = new Set<string>();
  for (const line of output.split(/\r?\n/)) {
    if (!line.includes("LISTEN")) {
      continue;
    }
    const parts = line.trim().split(/\s+/);
    if (parts.length < 7 || !parts[3].endsWith(`:${port}`)) {
      continue;
    }
    const pid = parts[6].split("/")[0];
    if (/^\d+$/.test(pid)) {
      pids.add(pid);
    }
  }
  return [...pids];
}

async function refreshPackageLists(ctx: TacticContext): Promise<string | null> {
  const result = await exec(ctx, "sudo", ["-n", "apt-get", "update"]);
  return succeeded(result)
    ? null
    : `Failed to update package list: ${describeFailure(result)}`;
}

const stopServiceTactic: Tactic = {
  name: "stop-service",
  async run(ctx) {
    const unit = ctx.catalog.services.linux.get(ctx.port) ?? ctx.service;
    if (!unit) {
      return skip("stop-service", "no service name for port");
    }

    const userStop = await exec(ctx, "systemctl", ["--user", "stop", unit]);
    if (succeeded(userStop)) {
      await exec(ctx, "systemctl", ["--user", "disable", unit]);
      return ok("stop-service", `stopped user service ${unit}`);
    }

    const systemStop = await exec(ctx, "sudo", ["-n", "systemctl", "stop", unit]);
    if (succeeded(systemStop)) {
      await exec(ctx, "sudo", ["-n", "systemctl", "disable", unit]);
      return ok("stop-service", `stopped system service ${unit}`);
    }

    return fail(
      "stop-service",
      `Failed to stop service ${unit}: ${describeFailure(systemStop)}`,
    );
  },
};

const killProcessesTactic: Tactic = {
  name: "kill-processes",
  async run(ctx) {
    const listing = await exec(ctx, "netstat", ["-tulpn"]);
    if (!succeeded(listing)) {
      return fail(
        "kill-processes",
        `could not list listeners: ${describeFailure(listing)}`,
      );
    }

    // Never signal ourselves when the placeholder is the listener
    const pids = parseLinuxListeners(listing.stdout, ctx.port).filter(
      (pid) => pid !== String(process.pid),
    );
    if (pids.length === 0) {
      return fail("kill-processes", `no process listening on port ${ctx.port}`);
    }

    const killed: string[] = [];
    for (const pid of pids) {
      const how = await execWithEscalation(ctx, "kill", ["-9", pid]);
      if (how === "plain") {
        killed.push(`killed process ${pid}`);
      } else if (how === "sudo") {
        killed.push(`killed process ${pid} (with sudo)`);
      }
    }

    return killed.length > 0
      ? ok("kill-processes", killed.join(", "))
      : fail("kill-processes", `could not kill ${pids.join(", ")}`);
  },
};

const signalFallbackTactic: Tactic = {
  name: "signal-fallback",
  async run(ctx) {
    if (ctx.binder.heldPorts().includes(ctx.port)) {
      return skip("signal-fallback", "port held by placeholder listener");
    }
    const how = await execWithEscalation(ctx, "fuser", ["-k", `${ctx.port}/tcp`]);
    if (how === "plain") {
      return ok("signal-fallback", "killed processes using fuser");
    }
    if (how === "sudo") {
      return ok("signal-fallback", "killed processes using fuser (with sudo)");
    }
    return fail("signal-fallback", "fuser found nothing to signal");
  },
};

const packetFilterTactic: Tactic = {
  name: "packet-filter",
  async run(ctx) {
    if (!ctx.elevated) {
      return skip("packet-filter", "root privileges required for iptables");
    }
    const result = await exec(ctx, "iptables", [
      "-A",
      "INPUT",
      "-p",
      "tcp",
      "--dport",
      String(ctx.port),
      "-j",
      "DROP",
    ]);
    return succeeded(result)
      ? ok("packet-filter", "blocked with iptables")
      : fail("packet-filter", `iptables failed: ${describeFailure(result)}`);
  },
};

export const linuxStrategy: PlatformStrategy = {
  platform: "linux",

  packageFor(port, catalog) {
    return catalog.packages.linux.get(port);
  },

  async verifyUpdate(ctx, packageName) {
    const refreshError = await refreshPackageLists(ctx);
    if (refreshError) {
      return fail("verify-update", refreshError);
    }
    const listing = await exec(ctx, "apt", ["list", "--upgradable"]);
    if (succeeded(listing) && listing.stdout.includes(packageName)) {
      return ok("verify-update", "Updates available from official repository");
    }
    return fail("verify-update", `No updates available for ${packageName}`);
  },

  async applyPackageUpdate(ctx, packageName) {
    const refreshError = await refreshPackageLists(ctx);
    if (refreshError) {
      return fail("package-update", refreshError);
    }
    const upgrade = await exec(ctx, "sudo", [
      "-n",
      "apt-get",
      "install",
      "--only-upgrade",
      "-y",
      packageName,
    ]);
    return succeeded(upgrade)
      ? ok("package-update", "Update successful")
      : fail("package-update", `Update failed: ${describeFailure(upgrade)}`);
  },

  async applyGenericUpdate(ctx) {
    const refreshError = await refreshPackageLists(ctx);
    if (refreshError) {
      return fail("generic-update", refreshError);
    }
    const upgrade = await exec(ctx, "sudo", ["-n", "apt-get", "upgrade", "-y"]);
    return succeeded(upgrade)
      ? ok("generic-update", "Generic Linux security updates applied successfully")
      : fail(
          "generic-update",
          `Generic Linux update failed: ${describeFailure(upgrade)}`,
        );
  },

  closeTactics: [
    stopServiceTactic,
    killProcessesTactic,
    signalFallbackTactic,
    packetFilterTactic,
    placeholderBindTactic,
  ],
};
