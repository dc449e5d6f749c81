import { VulnerablePortCatalog } from "../models/catalog";
import { RiskLevel, Vulnerability } from "../models/operation";

export function riskLevelFor(
  port: number,
  catalog: VulnerablePortCatalog,
): RiskLevel {
  return catalog.highRiskPorts.has(port) ? "High" : "Medium";
}

/**
 * Flag the open ports that appear in the catalog, keeping input order.
 * Ports outside the catalog are dropped.
 */
export function classify(
  openPorts: readonly number[],
  catalog: VulnerablePortCatalog,
): Vulnerability[] {
  const flagged: Vulnerability[] = [];
  for (const port of openPorts) {
    const entry = catalog.entries.get(port);
    if (!entry) {
      continue;
    }
    flagged.push({
      port,
      service: entry.service,
      description: entry.description,
      risk_level: riskLevelFor(port, catalog),
      status: "detected",
    });
  }
  return flagged;
}
