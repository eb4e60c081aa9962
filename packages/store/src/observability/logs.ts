/**
 * Console trace of store mutations and anomalies
 *
 * Mutations are traced at debug and print only when CONTACTBOOK_DEBUG is set.
 * Id collisions and failed verification always print as warnings.
 */

export type StoreEvent =
  | "store.open"
  | "store.close"
  | "contact.create"
  | "contact.update"
  | "contact.delete"
  | "store.id.collision"
  | "store.verify.failed";

export type LogLevel = "debug" | "warn";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: StoreEvent;
  /** Contact the event concerns */
  contactId?: string;
  details?: Record<string, unknown>;
}

export type LogContext = Pick<LogEntry, "contactId" | "details">;

function entry(level: LogLevel, event: StoreEvent, context: LogContext = {}): LogEntry {
  return { timestamp: new Date().toISOString(), level, event, ...context };
}

export class Logger {
  /**
   * Render an entry as one console line: `[ts] [LEVEL] [event] contact=<id> {details}`
   */
  static format({ timestamp, level, event, contactId, details }: LogEntry): string {
    let line = `[${timestamp}] [${level.toUpperCase()}] [${event}]`;
    if (contactId) {
      line += ` contact=${contactId}`;
    }
    if (details) {
      line += ` ${JSON.stringify(details)}`;
    }
    return line;
  }

  debug(event: StoreEvent, context?: LogContext): void {
    if (!process.env.CONTACTBOOK_DEBUG) return;
    console.debug(Logger.format(entry("debug", event, context)));
  }

  warn(event: StoreEvent, context?: LogContext): void {
    console.warn(Logger.format(entry("warn", event, context)));
  }
}

export const logger = new Logger();
