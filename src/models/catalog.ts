/**
 * Vulnerable port catalog: which open ports are flagged, how risky they
 * are, and the platform package and service names used to remediate them.
 *
 * Loaded once from YAML at startup; the result is frozen.
 */

import fs from "fs";
import path from "path";
import YAML from "yaml";
import { CatalogError, errorMessage } from "./errors";

export interface CatalogEntry {
  service: string;
  description: string;
}

export type PlatformTable = ReadonlyMap<number, string>;

export interface VulnerablePortCatalog {
  entries: ReadonlyMap<number, CatalogEntry>;
  highRiskPorts: ReadonlySet<number>;
  packages: { linux: PlatformTable; windows: PlatformTable };
  services: { linux: PlatformTable; windows: PlatformTable };
}

export const DEFAULT_CATALOG_PATH = "config/catalog.yaml";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toPort(value: unknown, where: string): number {
  const port = typeof value === "string" ? Number(value) : value;
  if (
    typeof port !== "number" ||
    !Number.isInteger(port) ||
    port < 1 ||
    port > 65535
  ) {
    throw new CatalogError(`${where}: invalid port ${String(value)}`);
  }
  return port;
}

function toName(value: unknown, where: string): string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new CatalogError(`${where}: expected a non-empty string`);
  }
  return value.trim();
}

function parseEntries(raw: unknown): Map<number, CatalogEntry> {
  if (!Array.isArray(raw)) {
    throw new CatalogError("ports: expected a list");
  }

  const entries = new Map<number, CatalogEntry>();
  raw.forEach((item: unknown, index) => {
    const where = `ports[${index}]`;
    if (!isRecord(item)) {
      throw new CatalogError(`${where}: expected a mapping`);
    }
    const port = toPort(item.port, where);
    if (entries.has(port)) {
      throw new CatalogError(`${where}: duplicate port ${port}`);
    }
    entries.set(
      port,
      Object.freeze({
        service: toName(item.service, `${where}.service`),
        description: toName(item.description, `${where}.description`),
      }),
    );
  });
  return entries;
}

function parseTable(raw: unknown, where: string): Map<number, string> {
  const table = new Map<number, string>();
  if (raw === undefined || raw === null) {
    return table;
  }
  if (!isRecord(raw)) {
    throw new CatalogError(`${where}: expected a mapping of port to name`);
  }
  for (const [key, value] of Object.entries(raw)) {
    table.set(toPort(key, where), toName(value, `${where}.${key}`));
  }
  return table;
}

function parsePlatformTables(
  raw: unknown,
  where: string,
): { linux: PlatformTable; windows: PlatformTable } {
  const section = isRecord(raw) ? raw : {};
  return Object.freeze({
    linux: parseTable(section.linux, `${where}.linux`),
    windows: parseTable(section.windows, `${where}.windows`),
  });
}

/**
 * Build a catalog from YAML text
 */
export function parseCatalog(source: string): VulnerablePortCatalog {
  let doc: unknown;
  try {
    doc = YAML.parse(source);
  } catch (err) {
    throw new CatalogError(`Invalid catalog YAML: ${errorMessage(err)}`);
  }
  if (!isRecord(doc)) {
    throw new CatalogError("Catalog must be a YAML mapping");
  }

  const entries = parseEntries(doc.ports);

  const highRiskRaw = doc.high_risk_ports ?? [];
  if (!Array.isArray(highRiskRaw)) {
    throw new CatalogError("high_risk_ports: expected a list");
  }
  const highRiskPorts = new Set(
    highRiskRaw.map((p: unknown) => toPort(p, "high_risk_ports")),
  );

  return Object.freeze({
    entries,
    highRiskPorts,
    packages: parsePlatformTables(doc.packages, "packages"),
    services: parsePlatformTables(doc.services, "services"),
  });
}

/**
 * Read and parse the catalog file; relative paths resolve against the
 * working directory
 */
export function loadCatalog(
  filePath: string = DEFAULT_CATALOG_PATH,
): VulnerablePortCatalog {
  const resolved = path.resolve(process.cwd(), filePath);
  let source: string;
  try {
    source = fs.readFileSync(resolved, "utf8");
  } catch (err) {
    throw new CatalogError(
      `Cannot read catalog ${resolved}: ${errorMessage(err)}`,
    );
  }
  return parseCatalog(source);
}
