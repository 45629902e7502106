/**
 * Structured Logging
 * Leveled entries with context, routed to pluggable handlers (console by default)
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  component?: string;
  stage?: string;
  nodeIndex?: number;
  remark?: string;
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

/**
 * Render an entry as console lines
 */
export function formatEntry(entry: LogEntry, color = true): string[] {
  const level = `[${entry.level.toUpperCase()}]`;
  const prefix = color
    ? `${LEVEL_COLORS[entry.level]}[${entry.timestamp}] ${level}${RESET}`
    : `[${entry.timestamp}] ${level}`;
  const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : "";

  const lines = [`${prefix} ${entry.message}${contextStr}`];
  if (entry.error) {
    lines.push(`  Error: ${entry.error.message}`);
    if (entry.error.stack) {
      lines.push(`  Stack: ${entry.error.stack.split("\n").slice(1, 4).join("\n")}`);
    }
  }
  return lines;
}

const consoleHandler: LogHandler = (entry) => {
  const write = entry.error || entry.level === "error" ? console.error : console.log;
  for (const line of formatEntry(entry, process.stdout.isTTY === true)) {
    write(line);
  }
};

let currentLevel: LogLevel = "info";
const handlers = new Set<LogHandler>([consoleHandler]);

function createEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  error?: Error
): LogEntry {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
  };

  if (context && Object.keys(context).length > 0) {
    entry.context = context;
  }

  if (error) {
    entry.error = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return entry;
}

function emit(entry: LogEntry): void {
  if (LEVEL_PRIORITY[entry.level] < LEVEL_PRIORITY[currentLevel]) {
    return;
  }

  for (const handler of handlers) {
    try {
      handler(entry);
    } catch (e) {
      console.error("Logger handler error:", e);
    }
  }
}

export const logger = {
  setLevel(level: LogLevel): void {
    currentLevel = level;
  },

  getLevel(): LogLevel {
    return currentLevel;
  },

  /**
   * Register a handler; the returned function unregisters it
   */
  addHandler(handler: LogHandler): () => void {
    handlers.add(handler);
    return () => {
      handlers.delete(handler);
    };
  },

  /** Stop writing to the console (handlers added later still run) */
  muteConsole(): void {
    handlers.delete(consoleHandler);
  },

  resetHandlers(): void {
    handlers.clear();
    handlers.add(consoleHandler);
  },

  debug(message: string, context?: LogContext): void {
    emit(createEntry("debug", message, context));
  },

  info(message: string, context?: LogContext): void {
    emit(createEntry("info", message, context));
  },

  warn(message: string, context?: LogContext): void {
    emit(createEntry("warn", message, context));
  },

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    const err = error instanceof Error ? error : undefined;
    emit(createEntry("error", message, context, err));
  },

  child(baseContext: LogContext): ChildLogger {
    return new ChildLogger(baseContext);
  },

  metric(name: string, value: number, context?: LogContext): void {
    emit(
      createEntry("info", `METRIC: ${name}=${value}`, {
        ...context,
        metric: name,
        value,
      })
    );
  },
};

class ChildLogger {
  constructor(private readonly baseContext: LogContext) {}

  debug(message: string, context?: LogContext): void {
    logger.debug(message, { ...this.baseContext, ...context });
  }

  info(message: string, context?: LogContext): void {
    logger.info(message, { ...this.baseContext, ...context });
  }

  warn(message: string, context?: LogContext): void {
    logger.warn(message, { ...this.baseContext, ...context });
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    logger.error(message, error, { ...this.baseContext, ...context });
  }

  metric(name: string, value: number, context?: LogContext): void {
    logger.metric(name, value, { ...this.baseContext, ...context });
  }

  child(additionalContext: LogContext): ChildLogger {
    return new ChildLogger({ ...this.baseContext, ...additionalContext });
  }
}

export type { ChildLogger };
