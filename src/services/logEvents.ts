/**
 * In-process log stream backing the /api/logs endpoints.
 *
 * The winston transport feeds it; a ring buffer lets a client that
 * connects mid-sweep catch up on what the scanner and the remediation
 * tactics have been doing.
 */

import { EventEmitter } from "events";

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export const LOG_LEVELS: readonly LogLevel[] = ["DEBUG", "INFO", "WARN", "ERROR"];

export interface LogEntry {
  id: string;
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  metadata?: Record<string, unknown>;
}

export interface LogFilter {
  /** Entries below this level are left out */
  minLevel?: LogLevel;
  /** Matches the operationId the orchestrator attaches to its entries */
  operationId?: string;
}

export type LogListener = (entry: LogEntry) => void;

const DEFAULT_BUFFER_SIZE = 100;

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function matchesFilter(entry: LogEntry, filter: LogFilter): boolean {
  if (
    filter.minLevel &&
    LOG_LEVELS.indexOf(entry.level) < LOG_LEVELS.indexOf(filter.minLevel)
  ) {
    return false;
  }
  if (
    filter.operationId !== undefined &&
    entry.metadata?.operationId !== filter.operationId
  ) {
    return false;
  }
  return true;
}

export class LogStream extends EventEmitter {
  private buffer: LogEntry[] = [];
  private counter = 0;

  constructor(private readonly maxBufferSize: number = DEFAULT_BUFFER_SIZE) {
    super();
    // One listener per open SSE connection
    this.setMaxListeners(100);
  }

  emitLog(
    level: LogLevel,
    service: string,
    message: string,
    metadata?: Record<string, unknown>,
  ): LogEntry {
    this.counter += 1;
    const entry: LogEntry = {
      id: `log-${Date.now()}-${this.counter}`,
      timestamp: new Date().toISOString(),
      level,
      service,
      message,
      metadata,
    };

    this.buffer.push(entry);
    if (this.buffer.length > this.maxBufferSize) {
      this.buffer.shift();
    }

    // Logging from here would recurse through the winston transport
    this.emit("log", entry);
    return entry;
  }

  /**
   * The newest `count` entries that pass the filter, oldest first
   */
  getRecentLogs(count: number = 50, filter: LogFilter = {}): LogEntry[] {
    if (count <= 0) {
      return [];
    }
    return this.buffer.filter((e) => matchesFilter(e, filter)).slice(-count);
  }

  /**
   * Returns the unsubscribe function
   */
  subscribe(listener: LogListener, filter: LogFilter = {}): () => void {
    const handler = (entry: LogEntry): void => {
      if (matchesFilter(entry, filter)) {
        listener(entry);
      }
    };
    this.on("log", handler);
    return () => {
      this.off("log", handler);
    };
  }

  getSubscriberCount(): number {
    return this.listenerCount("log");
  }

  clearBuffer(): void {
    this.buffer = [];
  }
}

export const logEvents = new LogStream();
