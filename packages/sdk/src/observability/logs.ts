/**
 * Structured debug logging for codec and record operations
 * Output goes to console.debug, and only while COEFSTORE_DEBUG is set.
 */

export interface LogEntry {
  timestamp: string;
  event: string;
  modelId?: string;
  message?: string;
  details?: Record<string, unknown>;
}

class Logger {
  #enabled = true;

  /**
   * Log a debug event
   */
  debug(event: string, data?: Omit<Partial<LogEntry>, "event">): void {
    if (!this.#enabled || !process.env.COEFSTORE_DEBUG) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      event,
      ...data,
    };

    const parts = [`[${entry.timestamp}] [DEBUG] [${event}]`];

    if (entry.modelId) {
      parts.push(entry.modelId);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    console.debug(parts.join(" "));
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
