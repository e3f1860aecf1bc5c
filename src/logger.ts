/**
 * Logger - publish/subscribe log events
 *
 * Components publish entries (task started, task failed, file written, ...).
 * Subscribers receive every entry at or above their minimum level, optionally
 * narrowed to one event prefix.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEntry = {
  timestamp: number;
  level: LogLevel;
  event: string; // e.g. "task:start", "output:written"
  message: string;
  data?: Record<string, unknown>;
};

export type LogSubscriber = (entry: LogEntry) => void;

export type LogFilter = {
  level?: LogLevel;
  event?: string;
};

type Subscription = {
  id: number;
  subscriber: LogSubscriber;
  filter: LogFilter;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export class Logger {
  private subscriptions: Subscription[] = [];
  private nextId = 1;

  /**
   * Registers a subscriber and returns a function that removes it.
   */
  subscribe(subscriber: LogSubscriber, filter: LogFilter = {}): () => void {
    const id = this.nextId;
    this.nextId += 1;
    this.subscriptions.push({ id, subscriber, filter });
    return () => {
      this.subscriptions = this.subscriptions.filter((sub) => sub.id !== id);
    };
  }

  log(
    level: LogLevel,
    event: string,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    const entry: LogEntry = { timestamp: Date.now(), level, event, message, data };

    for (const sub of this.subscriptions) {
      if (sub.filter.level && LEVEL_ORDER[level] < LEVEL_ORDER[sub.filter.level]) continue;
      if (sub.filter.event && !event.startsWith(sub.filter.event)) continue;
      sub.subscriber(entry);
    }
  }

  debug(event: string, message: string, data?: Record<string, unknown>): void {
    this.log("debug", event, message, data);
  }

  info(event: string, message: string, data?: Record<string, unknown>): void {
    this.log("info", event, message, data);
  }

  warn(event: string, message: string, data?: Record<string, unknown>): void {
    this.log("warn", event, message, data);
  }

  error(event: string, message: string, data?: Record<string, unknown>): void {
    this.log("error", event, message, data);
  }
}

export function formatLogEntry(entry: LogEntry): string {
  switch (entry.level) {
    case "error":
      return `Error: ${entry.message}`;
    case "warn":
      return `Warning: ${entry.message}`;
    case "info":
      return entry.message;
    case "debug":
      return `[${entry.event}] ${entry.message}`;
  }
}

export function consoleSubscriber(write: (text: string) => void): LogSubscriber {
  return (entry) => write(`${formatLogEntry(entry)}\n`);
}
