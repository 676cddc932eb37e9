/**
 * armgraph Logging Subsystem
 *
 * Structured, levelled logging with pluggable transports and value redaction.
 * Secret parameter values are registered as redaction patterns so they never
 * reach a transport.
 */

// =============================================================================
// Logger Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  resourceName?: string;
  deploymentName?: string;
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
}

export interface Logger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): Logger;
  withContext(context: LogContext): Logger;
  /** Returns a logger that additionally masks every literal occurrence of the given values. */
  withRedactedValues(values: readonly string[]): Logger;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
  isLevelEnabled(level: LogLevel): boolean;
}

export type LogContext = {
  resourceName?: string;
  deploymentName?: string;
};

export type LoggerOptions = {
  level?: LogLevel;
  transports?: LogTransport[];
  context?: LogContext;
  redactPatterns?: RegExp[];
};

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export function compareLogLevels(a: LogLevel, b: LogLevel): -1 | 0 | 1 {
  const pa = LOG_LEVEL_PRIORITY[a];
  const pb = LOG_LEVEL_PRIORITY[b];
  if (pa < pb) return -1;
  if (pa > pb) return 1;
  return 0;
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

// =============================================================================
// Default Log Formatter
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const {
    colors = process.stdout.isTTY ?? false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};

  const paint = (color: string, text: string): string => (colors ? `${color}${text}${COLORS.reset}` : text);

  return (entry: LogEntry): string => {
    const parts: string[] = [];

    if (timestamps) parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.deploymentName) contextParts.push(`deployment=${entry.deploymentName}`);
    if (entry.resourceName) contextParts.push(`resource=${entry.resourceName}`);
    if (contextParts.length > 0) parts.push(paint(COLORS.dim, `(${contextParts.join(" ")})`));

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      parts.push(paint(COLORS.dim, JSON.stringify(entry.metadata)));
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Transports
// =============================================================================

export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;
  private minLevel: LogLevel;

  constructor(options?: { formatter?: LogFormatter; minLevel?: LogLevel }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
    this.minLevel = options?.minLevel ?? "trace";
  }

  write(entry: LogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;

    const formatted = this.formatter(entry);
    if (entry.level === "error" || entry.level === "fatal") {
      console.error(formatted);
    } else if (entry.level === "warn") {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }
}

/**
 * Keeps entries in memory. Used by tests and by callers that render logs themselves.
 */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(): string[] {
    return this.entries.map((e) => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class SubsystemLogger implements Logger {
  readonly subsystem: string;
  private level: LogLevel;
  private transports: LogTransport[];
  private context: LogContext;
  private redactPatterns: RegExp[];

  constructor(subsystem: string, options?: LoggerOptions) {
    this.subsystem = subsystem;
    this.level = options?.level ?? "info";
    this.transports = options?.transports ?? [new ConsoleTransport()];
    this.context = options?.context ?? {};
    this.redactPatterns = options?.redactPatterns ?? [];
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log("fatal", message, meta);
  }

  child(name: string): Logger {
    return this.derive({ subsystem: `${this.subsystem}/${name}` });
  }

  withContext(context: LogContext): Logger {
    return this.derive({ context: { ...this.context, ...context } });
  }

  withRedactedValues(values: readonly string[]): Logger {
    const patterns = values
      .filter((v) => v.length > 0)
      .map((v) => new RegExp(escapeRegExp(v), "g"));
    return this.derive({ redactPatterns: [...this.redactPatterns, ...patterns] });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.level);
  }

  private derive(overrides: { subsystem?: string; context?: LogContext; redactPatterns?: RegExp[] }): Logger {
    return new SubsystemLogger(overrides.subsystem ?? this.subsystem, {
      level: this.level,
      transports: this.transports,
      context: overrides.context ?? this.context,
      redactPatterns: overrides.redactPatterns ?? this.redactPatterns,
    });
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.redact(message),
      metadata: meta ? this.redactObject(meta) : undefined,
      resourceName: this.context.resourceName,
      deploymentName: this.context.deploymentName,
    };

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }

  private redact(value: string): string {
    let result = value;
    for (const pattern of this.redactPatterns) {
      result = result.replace(pattern, "[REDACTED]");
    }
    return result;
  }

  private redactObject(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (typeof value === "string") {
        result[key] = this.redact(value);
      } else if (isPlainRecord(value)) {
        result[key] = this.redactObject(value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// =============================================================================
// Logger Factory
// =============================================================================

export function createLogger(subsystem: string, options?: LoggerOptions): Logger {
  return new SubsystemLogger(`armgraph/${subsystem}`, options);
}

let rootLogger: Logger | null = null;

/**
 * Get the shared logger (console transport, `info` level) or a child of it.
 */
export function getLogger(subsystem?: string): Logger {
  if (!rootLogger) {
    rootLogger = new SubsystemLogger("armgraph");
  }
  return subsystem ? rootLogger.child(subsystem) : rootLogger;
}

export function setRootLogger(logger: Logger): void {
  rootLogger = logger;
}
