/**
 * Windows strategy table: Windows Update through PowerShell; sc, taskkill,
 * netsh, New-NetFirewallRule and the registry for closing a port.
 *
 * The PowerShell scripts report through their exit code (1 for success and
 * 0 for failure, or a count of rules created), so they are checked against
 * that rather than `succeeded()`.
 */

import { TacticResult } from "../../models/operation";
import { CommandResult, describeFailure, succeeded } from "../commandRunner";
import {
  exec,
  fail,
  ok,
  placeholderBindTactic,
  PlatformStrategy,
  skip,
  Tactic,
  TacticContext,
} from "./tactics";

const SEARCH_UPDATES_SCRIPT = `
$Session = New-Object -ComObject Microsoft.Update.Session
$Searcher = $Session.CreateUpdateSearcher()
$Result = $Searcher.Search("IsInstalled=0 and Type='Software'")
if ($Result.Updates.Count -gt 0) {
  Write-Output "Updates available: $($Result.Updates.Count)"
  foreach ($Update in $Result.Updates) { Write-Output "Update: $($Update.Title)" }
} else {
  Write-Output "No updates available"
}
`;

const INSTALL_UPDATES_SCRIPT = `
try {
  $Session = New-Object -ComObject Microsoft.Update.Session
  $Searcher = $Session.CreateUpdateSearcher()
  $Result = $Searcher.Search("IsInstalled=0 and Type='Software' and IsHidden=0")
  if ($Result.Updates.Count -eq 0) { Write-Host "No updates available"; exit 0 }
  $Updates = New-Object -ComObject Microsoft.Update.UpdateColl
  foreach ($Update in $Result.Updates) {
    if ($Update.EulaAccepted -eq 0) { $Update.AcceptEula() }
    $Updates.Add($Update) | Out-Null
    Write-Host "Queued update: $($Update.Title)"
  }
  $Downloader = $Session.CreateUpdateDownloader()
  $Downloader.Updates = $Updates
  if ($Downloader.Download().ResultCode -ne 2) { Write-Host "Update download failed"; exit 0 }
  $Installer = $Session.CreateUpdateInstaller()
  $Installer.Updates = $Updates
  if ($Installer.Install().ResultCode -eq 2) { Write-Host "Updates installed successfully"; exit 1 }
  Write-Host "Update installation failed"
  exit 0
} catch {
  Write-Error "Failed to process Windows updates: $_"
  exit 0
}
`;

function registryScript(port: number): string {
  return `
try {
  $targets = @{
    445  = @("HKLM:\\SYSTEM\\CurrentControlSet\\Services\\LanmanServer", "Start", 4)
    3389 = @("HKLM:\\SYSTEM\\CurrentControlSet\\Control\\Terminal Server", "fDenyTSConnections", 1)
    23   = @("HKLM:\\SYSTEM\\CurrentControlSet\\Services\\TlntSvr", "Start", 4)
  }
  if ($targets.ContainsKey(${port})) {
    $t = $targets[${port}]
    if (-not (Test-Path $t[0])) { Write-Host "Registry key not found"; exit 0 }
    Set-ItemProperty -Path $t[0] -Name $t[1] -Value $t[2] -Type DWord
    Write-Host "Disabled service for port ${port} via registry"
    exit 1
  }
  $rules = "HKLM:\\SYSTEM\\CurrentControlSet\\Services\\SharedAccess\\Parameters\\FirewallPolicy\\FirewallRules"
  if (Test-Path $rules) {
    $name = "Block_Port_${port}_Registry"
    Set-ItemProperty -Path $rules -Name $name -Value "v2.30|Action=Block|Active=TRUE|Dir=In|Protocol=6|LPort=${port}|Name=$name|"
    Write-Host "Created registry firewall rule for port ${port}"
    exit 1
  }
  Write-Host "No registry method available for port ${port}"
  exit 0
} catch {
  Write-Error "Registry operation failed: $_"
  exit 0
}
`;
}

/**
 * One New-NetFirewallRule per protocol and direction. Exits with the
 * number of rules created.
 */
export function powershellFirewallScript(port: number): string {
  return `
try {
  Get-NetFirewallProfile | Where-Object { $_.Enabled -eq 'False' } | ForEach-Object {
    Set-NetFirewallProfile -Profile $_.Name -Enabled True
  }
  $created = 0
  foreach ($protocol in @("TCP", "UDP")) {
    foreach ($direction in @("Inbound", "Outbound")) {
      $name = "Block Port ${port} $protocol $direction"
      try {
        New-NetFirewallRule -DisplayName $name -Direction $direction -Protocol $protocol -LocalPort ${port} -Action Block -Enabled True -ErrorAction Stop | Out-Null
        $created++
        Write-Host "Created firewall rule: $name"
      } catch {
        Write-Warning "Failed to create rule $($name): $_"
      }
    }
  }
  exit $created
} catch {
  Write-Error "PowerShell firewall script failed: $_"
  exit 0
}
`;
}

function powershell(ctx: TacticContext, script: string): Promise<CommandResult> {
  return exec(ctx, "powershell", [
    "-NoProfile",
    "-ExecutionPolicy",
    "Bypass",
    "-Command",
    script,
  ]);
}

/**
 * PIDs in LISTENING rows of `netstat -ano` whose local address ends with
 * the port
 */
export function parseWindowsListeners(output: string, port: number): string[] {
  const pids = new Set<string>();
  for (const line of output.split(/\r?\n/)) {
    const parts = line.trim().split(/\s+/);
    if (parts.length < 5 || parts[3] !== "LISTENING") {
      continue;
    }
    if (!parts[1].endsWith(`:${port}`)) {
      continue;
    }
    if (/^\d+$/.test(parts[4]) && parts[4] !== "0") {
      pids.add(parts[4]);
    }
  }
  return [...pids];
}

export function firewallRuleArgs(port: number): string[][] {
  const rules: string[][] = [];
  for (const protocol of ["TCP", "UDP"]) {
    for (const [dir, label] of [
      ["in", "In"],
      ["out", "Out"],
    ]) {
      rules.push([
        "advfirewall",
        "firewall",
        "add",
        "rule",
        `name=Block_Port_${port}_${protocol}_${label}`,
        `dir=${dir}`,
        "action=block",
        `protocol=${protocol}`,
        `localport=${port}`,
        "enable=yes",
      ]);
    }
  }
  return rules;
}

async function installUpdates(
  ctx: TacticContext,
  tactic: string,
): Promise<TacticResult> {
  if (!ctx.elevated) {
    return fail(tactic, "Administrator privileges required for Windows updates");
  }
  const result = await powershell(ctx, INSTALL_UPDATES_SCRIPT);
  if (result.exitCode === 1) {
    return ok(tactic, `Windows updates processed successfully: ${result.stdout.trim()}`);
  }
  return fail(
    tactic,
    `Windows update failed or no updates available: ${describeFailure(result)}`,
  );
}

const stopServiceTactic: Tactic = {
  name: "stop-service",
  async run(ctx) {
    const serviceName = ctx.catalog.services.windows.get(ctx.port);
    if (!serviceName) {
      return skip("stop-service", `no service mapping for port ${ctx.port}`);
    }
    if (!ctx.elevated) {
      return skip("stop-service", "Administrator privileges required for sc");
    }

    const stop = await exec(ctx, "sc", ["stop", serviceName]);
    if (!succeeded(stop)) {
      return fail(
        "stop-service",
        `Failed to stop service ${serviceName}: ${describeFailure(stop)}`,
      );
    }
    const disable = await exec(ctx, "sc", [
      "config",
      serviceName,
      "start=",
      "disabled",
    ]);
    return ok(
      "stop-service",
      succeeded(disable)
        ? `stopped and disabled service ${serviceName}`
        : `stopped service ${serviceName}`,
    );
  },
};

const killProcessesTactic: Tactic = {
  name: "kill-processes",
  async run(ctx) {
    const listing = await exec(ctx, "netstat", ["-ano"]);
    if (!succeeded(listing)) {
      return fail(
        "kill-processes",
        `could not list listeners: ${describeFailure(listing)}`,
      );
    }
    const pids = parseWindowsListeners(listing.stdout, ctx.port).filter(
      (pid) => pid !== String(process.pid),
    );
    if (pids.length === 0) {
      return fail("kill-processes", `no process listening on port ${ctx.port}`);
    }

    const killed: string[] = [];
    for (const pid of pids) {
      const result = await exec(ctx, "taskkill", ["/F", "/PID", pid]);
      if (succeeded(result)) {
        killed.push(`killed process ${pid}`);
      }
    }
    return killed.length > 0
      ? ok("kill-processes", killed.join(", "))
      : fail("kill-processes", `could not kill ${pids.join(", ")}`);
  },
};

const firewallTactic: Tactic = {
  name: "firewall",
  async run(ctx) {
    if (!ctx.elevated) {
      return skip("firewall", "Administrator privileges required for netsh");
    }

    const state = await exec(ctx, "netsh", [
      "advfirewall",
      "show",
      "allprofiles",
      "state",
    ]);
    if (state.stdout.includes("OFF")) {
      const enable = await exec(ctx, "netsh", [
        "advfirewall",
        "set",
        "allprofiles",
        "state",
        "on",
      ]);
      if (!succeeded(enable)) {
        return fail("firewall", "Could not enable Windows Firewall");
      }
    }

    let added = 0;
    for (const args of firewallRuleArgs(ctx.port)) {
      const result = await exec(ctx, "netsh", args);
      if (succeeded(result)) {
        added += 1;
      }
    }
    return added > 0
      ? ok("firewall", `blocked with Windows Firewall (${added} rules)`)
      : fail("firewall", "no firewall rule could be added");
  },
};

const powershellFirewallTactic: Tactic = {
  name: "powershell-firewall",
  async run(ctx) {
    if (!ctx.elevated) {
      return skip(
        "powershell-firewall",
        "Administrator privileges required for New-NetFirewallRule",
      );
    }
    const result = await powershell(ctx, powershellFirewallScript(ctx.port));
    const created = result.exitCode ?? 0;
    return !result.error && created > 0
      ? ok("powershell-firewall", `blocked with PowerShell firewall (${created} rules)`)
      : fail(
          "powershell-firewall",
          `no PowerShell firewall rule could be added: ${describeFailure(result)}`,
        );
  },
};

const registryTactic: Tactic = {
  name: "registry-disable",
  async run(ctx) {
    if (!ctx.elevated) {
      return skip(
        "registry-disable",
        "Administrator privileges required for registry operations",
      );
    }
    const result = await powershell(ctx, registryScript(ctx.port));
    return result.exitCode === 1
      ? ok("registry-disable", "disabled via registry")
      : fail("registry-disable", `registry change failed: ${describeFailure(result)}`);
  },
};

export const windowsStrategy: PlatformStrategy = {
  platform: "windows",

  packageFor(port, catalog) {
    return catalog.packages.windows.get(port);
  },

  async verifyUpdate(ctx) {
    const result = await powershell(ctx, SEARCH_UPDATES_SCRIPT);
    if (succeeded(result) && result.stdout.includes("Updates available")) {
      return ok("verify-update", "Windows updates available from Microsoft");
    }
    return fail(
      "verify-update",
      succeeded(result)
        ? "No Windows updates available"
        : `Failed to check Windows updates: ${describeFailure(result)}`,
    );
  },

  applyPackageUpdate(ctx) {
    return installUpdates(ctx, "package-update");
  },

  applyGenericUpdate(ctx) {
    return installUpdates(ctx, "generic-update");
  },

  closeTactics: [
    stopServiceTactic,
    killProcessesTactic,
    firewallTactic,
    powershellFirewallTactic,
    placeholderBindTactic,
    registryTactic,
  ],
};
