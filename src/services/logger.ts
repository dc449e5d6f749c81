import winston from "winston";
import Transport from "winston-transport";
import { config } from "../config";
import { logEvents, LogLevel, LogStream } from "./logEvents";

const SERVICE_NAME = "port-warden";

const LEVEL_MAP: Record<string, LogLevel> = {
  error: "ERROR",
  warn: "WARN",
  info: "INFO",
  http: "INFO",
  verbose: "DEBUG",
  debug: "DEBUG",
  silly: "DEBUG",
};

const RESERVED_FIELDS = new Set(["level", "message", "timestamp", "service"]);

/**
 * Winston transport that mirrors every entry into the in-process log
 * stream, which the /api/logs endpoints serve.
 */
export class LogStreamTransport extends Transport {
  private readonly serviceName: string;
  private readonly stream: LogStream;

  constructor(
    opts?: Transport.TransportStreamOptions & {
      service?: string;
      stream?: LogStream;
    },
  ) {
    super(opts);
    this.serviceName = opts?.service || SERVICE_NAME;
    this.stream = opts?.stream || logEvents;
  }

  log(
    info: {
      level: string;
      message: unknown;
      [key: string]: unknown;
    },
    callback: () => void,
  ): void {
    setImmediate(() => {
      const level = LEVEL_MAP[info.level] || "INFO";
      const service =
        typeof info.service === "string" ? info.service : this.serviceName;

      const metadata = Object.fromEntries(
        Object.entries(info).filter(([k]) => !RESERVED_FIELDS.has(k)),
      );

      this.stream.emitLog(
        level,
        service,
        String(info.message),
        Object.keys(metadata).length > 0 ? metadata : undefined,
      );
      this.emit("logged", info);
    });

    callback();
  }
}

// Console only: colorize rewrites info.level, which the stream transport maps
const textFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}${extra}`;
  }),
);

export const logger = winston.createLogger({
  level: config.logging.level,
  format: winston.format.timestamp(),
  defaultMeta: { service: SERVICE_NAME },
  transports: [
    new winston.transports.Console({
      format: config.logging.format === "text" ? textFormat : winston.format.json(),
    }),
    new LogStreamTransport({ service: SERVICE_NAME }),
  ],
});
