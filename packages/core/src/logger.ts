/**
 * Structured Logging
 *
 * Leveled entries fan out to handlers (colored console by default, JSON
 * lines in production). Context comes from three places, merged in order:
 * the scope opened by `logger.runWithContext` (one per HTTP request), the
 * child logger's bound fields, and the call itself.
 */

import { AsyncLocalStorage } from "async_hooks";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  correlationId?: string;
  component?: string;
  channelId?: string;
  endpoint?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export type LogHandler = (entry: LogEntry) => void;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m",
  info: "\x1b[36m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
};
const RESET = "\x1b[0m";

const scope = new AsyncLocalStorage<LogContext>();

let currentLevel: LogLevel = "info";

const consoleHandler: LogHandler = (entry) => {
  const prefix = `${LEVEL_COLORS[entry.level]}[${entry.timestamp}] [${entry.level.toUpperCase()}]${RESET}`;
  const line = `${prefix} ${entry.message}${entry.context ? ` ${JSON.stringify(entry.context)}` : ""}`;

  // stdout stays clean for CLI output
  if (entry.level === "debug" || entry.level === "info") {
    console.log(line);
    return;
  }

  console.error(line);
  if (entry.error) {
    console.error(`  Error: ${entry.error.message}`);
    if (entry.error.stack) {
      console.error(`  Stack: ${entry.error.stack.split("\n").slice(1, 4).join("\n")}`);
    }
  }
};

/**
 * One JSON object per line, for log collectors
 */
export const jsonHandler: LogHandler = (entry) => {
  process.stdout.write(`${JSON.stringify(entry)}\n`);
};

const handlers: LogHandler[] = [consoleHandler];

function write(level: LogLevel, message: string, context?: LogContext, error?: unknown): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel]) {
    return;
  }

  const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };

  const merged = { ...scope.getStore(), ...context };
  if (Object.keys(merged).length > 0) {
    entry.context = merged;
  }

  if (error instanceof Error) {
    entry.error = { name: error.name, message: error.message, stack: error.stack };
  }

  for (const handler of handlers) {
    try {
      handler(entry);
    } catch (e) {
      console.error("Logger handler error:", e);
    }
  }
}

/**
 * Logger with bound context
 */
class ChildLogger {
  constructor(private readonly bound: LogContext) {}

  debug(message: string, context?: LogContext): void {
    write("debug", message, { ...this.bound, ...context });
  }

  info(message: string, context?: LogContext): void {
    write("info", message, { ...this.bound, ...context });
  }

  warn(message: string, context?: LogContext): void {
    write("warn", message, { ...this.bound, ...context });
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    write("error", message, { ...this.bound, ...context }, error);
  }

  metric(name: string, value: number, context?: LogContext): void {
    write("info", `METRIC: ${name}=${value}`, { ...this.bound, ...context, metric: name, value });
  }

  child(context: LogContext): ChildLogger {
    return new ChildLogger({ ...this.bound, ...context });
  }
}

const root = new ChildLogger({});

export const logger = {
  setLevel(level: LogLevel): void {
    currentLevel = level;
  },

  /**
   * Replace every handler, e.g. with jsonHandler in production or a
   * collecting handler in tests
   */
  setHandlers(...next: LogHandler[]): void {
    handlers.length = 0;
    handlers.push(...next);
  },

  resetHandlers(): void {
    handlers.length = 0;
    handlers.push(consoleHandler);
  },

  /**
   * Run `fn` with `context` added to every entry written inside it,
   * including entries from async work it starts. Scopes nest.
   */
  runWithContext<T>(context: LogContext, fn: () => T): T {
    return scope.run({ ...scope.getStore(), ...context }, fn);
  },

  debug: root.debug.bind(root),
  info: root.info.bind(root),
  warn: root.warn.bind(root),
  error: root.error.bind(root),
  metric: root.metric.bind(root),
  child: root.child.bind(root),
};

export type { ChildLogger };
