/**
 * Provisioning Logger
 *
 * Structured, leveled logging with subsystems and pluggable transports.
 * Secret-bearing metadata keys are always redacted; secret values must never
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
  runId?: string;
  stepId?: string;
  resource?: string;
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
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
  isLevelEnabled(level: LogLevel): boolean;
}

export type LogContext = {
  runId?: string;
  stepId?: string;
  resource?: string;
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

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

// =============================================================================
// Redaction
// =============================================================================

/** Metadata keys whose values are replaced before any transport sees them. */
export const SENSITIVE_KEYS = new Set([
  "value",
  "password",
  "secret",
  "clientsecret",
  "secrettext",
  "connectionstring",
  "token",
  "accesstoken",
  "administratorloginpassword",
]);

export const REDACTED = "[REDACTED]";

export function redactMetadata(meta: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      result[key] = REDACTED;
    } else if (typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date)) {
      result[key] = redactMetadata(Object.fromEntries(Object.entries(value)));
    } else {
      result[key] = value;
    }
  }
  return result;
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
    colors = process.stderr.isTTY ?? false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};

  const paint = (color: string, text: string) => (colors ? `${color}${text}${COLORS.reset}` : text);

  return (entry: LogEntry): string => {
    const parts: string[] = [];

    if (timestamps) parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.runId) contextParts.push(`run=${entry.runId}`);
    if (entry.stepId) contextParts.push(`step=${entry.stepId}`);
    if (entry.resource) contextParts.push(`resource=${entry.resource}`);
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

/**
 * Writes every entry to stderr so stdout stays free for command output.
 */
export class StderrTransport implements LogTransport {
  name = "stderr";
  private formatter: LogFormatter;

  constructor(options?: { formatter?: LogFormatter }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
  }

  write(entry: LogEntry): void {
    process.stderr.write(`${this.formatter(entry)}\n`);
  }
}

/** Keeps entries in memory; used by tests and `--dry-run` summaries. */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

type LevelRef = { level: LogLevel };

export class ProvisioningLogger implements Logger {
  readonly subsystem: string;
  // shared between a logger and its children so `setLevel` applies everywhere
  private levelRef: LevelRef;
  private transports: LogTransport[];
  private context: LogContext;

  constructor(options: {
    subsystem: string;
    level?: LogLevel | LevelRef;
    transports?: LogTransport[];
    context?: LogContext;
  }) {
    this.subsystem = options.subsystem;
    this.levelRef = typeof options.level === "object" ? options.level : { level: options.level ?? "info" };
    this.transports = options.transports ?? [new StderrTransport()];
    this.context = options.context ?? {};
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
    return new ProvisioningLogger({
      subsystem: `${this.subsystem}/${name}`,
      level: this.levelRef,
      transports: this.transports,
      context: this.context,
    });
  }

  withContext(context: LogContext): Logger {
    return new ProvisioningLogger({
      subsystem: this.subsystem,
      level: this.levelRef,
      transports: this.transports,
      context: { ...this.context, ...context },
    });
  }

  setLevel(level: LogLevel): void {
    this.levelRef.level = level;
  }

  getLevel(): LogLevel {
    return this.levelRef.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.levelRef.level);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.levelRef.level)) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message,
      metadata: meta ? redactMetadata(meta) : undefined,
      ...this.context,
    };

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch {
        // a broken transport must not abort provisioning
      }
    }
  }
}

// =============================================================================
// Logger Factory
// =============================================================================

export function createLogger(
  subsystem: string,
  options?: { level?: LogLevel; transports?: LogTransport[] },
): Logger {
  return new ProvisioningLogger({
    subsystem,
    level: options?.level ?? "info",
    transports: options?.transports,
  });
}

let rootLogger: Logger | null = null;

/**
 * Get (or lazily create) the process-wide logger, optionally scoped to a
 * subsystem.
 */
export function getLogger(subsystem?: string): Logger {
  if (!rootLogger) {
    rootLogger = createLogger("provision");
  }
  return subsystem ? rootLogger.child(subsystem) : rootLogger;
}

export function setRootLogger(logger: Logger): void {
  rootLogger = logger;
}
