import dotenv from "dotenv";

dotenv.config();

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const config = {
  server: {
    port: intFromEnv(process.env.PORT, 8000),
    host: process.env.HOST || "0.0.0.0",
  },
  logging: {
    level: process.env.LOG_LEVEL || "info",
    // "json" for collectors, "text" for a terminal running the sweep
    format: process.env.LOG_FORMAT === "text" ? "text" : "json",
  },
  cors: {
    origin: (
      process.env.CORS_ORIGIN || "http://localhost:3000,http://localhost:5173"
    )
      .split(",")
      .map((o) => o.trim())
      .filter((o) => o.length > 0),
  },
  auth: {
    // Empty disables the X-API-Key check
    apiKey: process.env.API_KEY || "",
  },
  scan: {
    tool: process.env.SCAN_TOOL || "nmap",
    timeoutMs: intFromEnv(process.env.SCAN_TIMEOUT_MS, 300_000),
  },
  remediation: {
    commandTimeoutMs: intFromEnv(process.env.COMMAND_TIMEOUT_MS, 600_000),
    maxAttempts: intFromEnv(process.env.REMEDIATION_MAX_ATTEMPTS, 3),
    // Pause before re-scanning a port so restarted services settle
    verifyDelayMs: intFromEnv(process.env.VERIFY_DELAY_MS, 5000),
    platform: process.env.PLATFORM || "",
    rateLimitPerMinute: intFromEnv(process.env.ACTION_RATE_LIMIT, 30),
  },
  catalog: {
    path: process.env.CATALOG_PATH || "config/catalog.yaml",
  },
};

export type AppConfig = typeof config;
