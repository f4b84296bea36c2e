/**
 * Ledger Logging Subsystem
 *
 * Levelled logging with subsystem names and contextual fields (batch,
 * cloud, policy). Entries go to stderr as one plain-text line each, so
 * command output on stdout stays machine-readable.
 */

// =============================================================================
// Logger Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export type LogContext = {
  cloud?: string;
  batchId?: string;
  policyId?: string;
};

export type LogEntry = LogContext & {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  write(entry: LogEntry): void;
}

export interface LedgerLogger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): LedgerLogger;
  withContext(context: LogContext): LedgerLogger;
}

export type LoggingOptions = {
  level?: LogLevel;
  /** Regular expressions; matches in messages and string metadata become [REDACTED]. */
  redactPatterns?: string[];
};

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel);
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

// =============================================================================
// Formatting & Transports
// =============================================================================

/** `<time> LEVEL [subsystem] message (context) {metadata}` */
export function createDefaultFormatter(options: { timestamps?: boolean } = {}): LogFormatter {
  const timestamps = options.timestamps ?? true;

  return (entry) => {
    const parts: string[] = [];
    if (timestamps) parts.push(entry.timestamp.toISOString());
    parts.push(entry.level.toUpperCase().padEnd(5), `[${entry.subsystem}]`, entry.message);

    const context = [
      entry.cloud && `cloud=${entry.cloud}`,
      entry.batchId && `batch=${entry.batchId}`,
      entry.policyId && `policy=${entry.policyId}`,
    ].filter((part): part is string => Boolean(part));
    if (context.length > 0) parts.push(`(${context.join(" ")})`);

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      parts.push(JSON.stringify(entry.metadata));
    }

    let line = parts.join(" ");
    if (entry.error) {
      line += `\n  Error: ${entry.error.name}: ${entry.error.message}`;
      if (entry.error.stack) line += `\n${entry.error.stack}`;
    }
    return line;
  };
}

export class ConsoleTransport implements LogTransport {
  constructor(private readonly format: LogFormatter = createDefaultFormatter()) {}

  write(entry: LogEntry): void {
    process.stderr.write(`${this.format(entry)}\n`);
  }
}

/** Keeps entries in memory for tests. */
export class MemoryTransport implements LogTransport {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

// =============================================================================
// Logger
// =============================================================================

/** Level, transports and redaction are shared by a logger and all its children. */
type LoggerSink = {
  level: LogLevel;
  transports: LogTransport[];
  redactPatterns: RegExp[];
};

class SubsystemLogger implements LedgerLogger {
  constructor(
    readonly subsystem: string,
    private readonly sink: LoggerSink,
    private readonly context: LogContext = {},
  ) {}

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

  child(name: string): LedgerLogger {
    return new SubsystemLogger(`${this.subsystem}/${name}`, this.sink, this.context);
  }

  withContext(context: LogContext): LedgerLogger {
    return new SubsystemLogger(this.subsystem, this.sink, { ...this.context, ...context });
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.sink.level)) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.redact(message),
      ...this.context,
    };

    if (meta) {
      const { error, ...rest } = meta;
      if (error instanceof Error) {
        entry.error = { name: error.name, message: this.redact(error.message), stack: error.stack };
        entry.metadata = this.redactObject(rest);
      } else {
        entry.metadata = this.redactObject(meta);
      }
    }

    for (const transport of this.sink.transports) {
      transport.write(entry);
    }
  }

  private redact(value: string): string {
    return this.sink.redactPatterns.reduce((text, pattern) => text.replace(pattern, "[REDACTED]"), value);
  }

  private redactObject(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (typeof value === "string") {
        result[key] = this.redact(value);
      } else if (isPlainObject(value)) {
        result[key] = this.redactObject(value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

// =============================================================================
// Logger Factory
// =============================================================================

export function createLedgerLogger(
  subsystem: string,
  options?: LoggingOptions & { transports?: LogTransport[] },
): LedgerLogger {
  return new SubsystemLogger(`ledger/${subsystem}`, {
    level: options?.level ?? logLevelFromEnv() ?? "info",
    transports: options?.transports ?? [new ConsoleTransport()],
    redactPatterns: (options?.redactPatterns ?? []).map((p) => new RegExp(p, "gi")),
  });
}

/** Level named by CLOUDLEDGER_LOG_LEVEL, if it names one. */
export function logLevelFromEnv(): LogLevel | undefined {
  const raw = process.env.CLOUDLEDGER_LOG_LEVEL?.toLowerCase();
  return raw && isLogLevel(raw) ? raw : undefined;
}

let globalLogger: LedgerLogger | null = null;

/** Get or create the process-wide logger, optionally as a named child. */
export function getLedgerLogger(subsystem?: string): LedgerLogger {
  if (!globalLogger) {
    globalLogger = createLedgerLogger("core");
  }
  return subsystem ? globalLogger.child(subsystem) : globalLogger;
}

export function setGlobalLedgerLogger(logger: LedgerLogger | null): void {
  globalLogger = logger;
}
