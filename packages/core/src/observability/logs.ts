/**
 * Structured logging for collection internals
 *
 * Lines look like `[ts] [LEVEL] [event] structure message {details}`.
 * Debug lines are written only while TRIMSEQ_DEBUG is set; hot paths should
 * check isDebugEnabled() before building their details.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  /** Name of the collection or pool emitting the event */
  structure?: string;
  message?: string;
  details?: Record<string, unknown>;
}

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function formatEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];
  if (entry.structure) parts.push(entry.structure);
  if (entry.message) parts.push(entry.message);
  if (entry.details) parts.push(JSON.stringify(entry.details));
  return parts.join(" ");
}

class Logger {
  #enabled = true;

  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return;
    if (level === "debug" && !process.env.TRIMSEQ_DEBUG) return;

    WRITERS[level](
      formatEntry({
        ...data,
        timestamp: new Date().toISOString(),
        level,
        event,
      })
    );
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  isDebugEnabled(): boolean {
    return this.#enabled && Boolean(process.env.TRIMSEQ_DEBUG);
  }
}

export const logger = new Logger();
