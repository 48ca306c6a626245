/**
 * Structured logging for the formatting library
 *
 * Formatters are pure, so the only things worth logging are rejected input
 * and sentinel fallbacks. The default level is WARN, which keeps consumers'
 * output clean unless they opt in through `LOG_LEVEL`.
 *
 */

/**
 * Available log levels in order of severity
 *
 * @public
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/**
 * Log entry structure
 *
 * @public
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  levelName: string;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;

  /**
   * Formatter or module that generated this log
   */
  component?: string;
}

/**
 * Logger configuration options
 *
 * @public
 */
export interface LoggerOptions {
  /**
   * Minimum log level to output
   */
  level?: LogLevel;

  /**
   * Component name for log entries
   */
  component?: string;

  /**
   * Enable pretty formatting instead of one JSON object per line
   */
  prettyPrint?: boolean;

  /**
   * Custom output function (defaults to console methods)
   */
  output?: (entry: LogEntry) => void;
}

/**
 * Resolve a log level name such as `"debug"` or `"WARN"`
 *
 * @param name - Level name, case-insensitive
 * @returns The matching level, or undefined for unknown names
 *
 * @public
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  switch (name?.toUpperCase()) {
    case "DEBUG": {
      return LogLevel.DEBUG;
    }
    case "INFO": {
      return LogLevel.INFO;
    }
    case "WARN": {
      return LogLevel.WARN;
    }
    case "ERROR": {
      return LogLevel.ERROR;
    }
    case "SILENT": {
      return LogLevel.SILENT;
    }
    default: {
      return undefined;
    }
  }
}

/**
 * Structured logger with configurable levels and formatting
 *
 * @public
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly component?: string;
  private readonly prettyPrint: boolean;
  private readonly output: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.WARN;
    if ("component" in options) {
      this.component = options.component;
    }
    this.prettyPrint = options.prettyPrint ?? process.env.NODE_ENV !== "production";
    this.output = options.output ?? this.defaultOutput.bind(this);
  }

  debug(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.log(LogLevel.DEBUG, message, context, error);
  }

  info(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.log(LogLevel.INFO, message, context, error);
  }

  warn(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.log(LogLevel.WARN, message, context, error);
  }

  error(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  /**
   * Whether entries at the given level would be emitted
   */
  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.level && this.level !== LogLevel.SILENT;
  }

  /**
   * Create a child logger with additional context
   *
   * @param childContext - Context to add to all child log entries
   * @param childComponent - Optional component name override
   * @returns New logger instance with enriched context
   *
   * @example
   * ```typescript
   * const sizeLogger = logger.child({ system: "binary" }, "human-size");
   * sizeLogger.debug("Rejected byte count", { bytes: -1 });
   * ```
   */
  child(childContext: Record<string, unknown>, childComponent?: string): Logger {
    const loggerOptions: LoggerOptions = {
      level: this.level,
      prettyPrint: this.prettyPrint,
      output: (entry: LogEntry) => {
        this.output({
          ...entry,
          context: { ...childContext, ...entry.context },
        });
      },
    };

    const resolvedComponent = childComponent ?? this.component;
    if (resolvedComponent) {
      loggerOptions.component = resolvedComponent;
    }

    return new Logger(loggerOptions);
  }

  /**
   * @internal
   */
  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      levelName: LogLevel[level],
      message,
      ...(context && { context }),
      ...(error && { error }),
      ...(this.component && { component: this.component }),
    };

    this.output(entry);
  }

  /**
   * @internal
   */
  private defaultOutput(entry: LogEntry): void {
    const line = this.prettyPrint ? formatPrettyEntry(entry) : formatJsonEntry(entry);
    consoleMethodFor(entry.level)(line);
  }
}

/**
 * Render an entry as a single readable line plus optional detail lines
 *
 * @internal
 */
export function formatPrettyEntry(entry: LogEntry): string {
  const timestamp = entry.timestamp.replace(/T/, " ").replace(/\..+/, "");
  const component = entry.component ? ` [${entry.component}]` : "";
  const level = entry.levelName.padEnd(5);

  let output = `${timestamp} ${level}${component} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    output += `\n  Context: ${JSON.stringify(entry.context, jsonSafeReplacer, 2)}`;
  }

  if (entry.error) {
    output += `\n  Error: ${entry.error.stack ?? entry.error.message}`;
  }

  return output;
}

/**
 * Render an entry as one JSON object
 *
 * @internal
 */
export function formatJsonEntry(entry: LogEntry): string {
  return JSON.stringify(
    {
      ...entry,
      error: entry.error
        ? {
            name: entry.error.name,
            message: entry.error.message,
            stack: entry.error.stack,
          }
        : undefined,
    },
    jsonSafeReplacer,
  );
}

// Rejected inputs are often bigints or non-finite numbers
function jsonSafeReplacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") {
    return `${value.toString()}n`;
  }
  if (typeof value === "number" && !Number.isFinite(value)) {
    return String(value);
  }
  return value;
}

function consoleMethodFor(level: LogLevel): typeof console.log {
  switch (level) {
    case LogLevel.DEBUG: {
      return console.debug;
    }
    case LogLevel.INFO: {
      return console.info;
    }
    case LogLevel.WARN: {
      return console.warn;
    }
    case LogLevel.ERROR: {
      return console.error;
    }
    default: {
      return console.log;
    }
  }
}

/**
 * Default logger instance for convenient access
 *
 * @public
 */
export const logger = new Logger({ component: "human-units" });
