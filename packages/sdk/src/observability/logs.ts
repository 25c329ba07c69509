/**
 * Structured logging for record store and account operations
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  file?: string;
  position?: number;
  account?: number;
  message?: string;
  details?: Record<string, unknown>;
}

export class Logger {
  #enabled = true;

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    const parts = [`[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`];

    if (entry.account !== undefined) {
      parts.push(`#${entry.account}`);
    } else if (entry.position !== undefined) {
      parts.push(`slot ${entry.position}`);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.file) {
      parts.push(`(${entry.file})`);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    const line = parts.join(" ");

    // stdout belongs to command output, so everything goes to stderr
    switch (level) {
      case "debug":
        if (process.env.SLOTBANK_DEBUG) {
          console.debug(line);
        }
        break;
      case "info":
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
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

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
