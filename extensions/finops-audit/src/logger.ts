/**
 * FinOps Audit — Logging
 *
 * Subsystem logger with levels, pluggable transports and child subsystems.
 * Every pipeline stage logs through a child of the process-wide audit logger
 * unless the caller hands in its own.
 */

// =============================================================================
// Logger Types
// =============================================================================

export const AUDIT_LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type AuditLogLevel = (typeof AUDIT_LOG_LEVELS)[number];

export type AuditLogEntry = {
  timestamp: Date;
  level: AuditLogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  kind?: string;
  resourceId?: string;
};

export interface LogTransport {
  name: string;
  write(entry: AuditLogEntry): void;
}

/** Narrows log lines to one kind or resource. */
export type LogContext = {
  kind?: string;
  resourceId?: string;
};

export interface AuditLogger {
  readonly subsystem: string;

  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;

  child(name: string): AuditLogger;
  withContext(context: LogContext): AuditLogger;
  setLevel(level: AuditLogLevel): void;
  getLevel(): AuditLogLevel;
}

export function isAuditLogLevel(value: string): value is AuditLogLevel {
  return AUDIT_LOG_LEVELS.some((level) => level === value);
}

function levelRank(level: AuditLogLevel): number {
  return AUDIT_LOG_LEVELS.indexOf(level);
}

// =============================================================================
// Formatting
// =============================================================================

const LEVEL_COLORS: Record<AuditLogLevel, string> = {
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
};
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

/**
 * `<timestamp> <LEVEL> [<subsystem>] <message> (kind=… resource=…) {metadata}`
 */
export function formatLogEntry(entry: AuditLogEntry, options: { colors?: boolean } = {}): string {
  const paint = (color: string, text: string) => (options.colors ? `${color}${text}${RESET}` : text);

  const parts = [
    paint(DIM, entry.timestamp.toISOString()),
    paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)),
    `[${entry.subsystem}]`,
    entry.message,
  ];

  const context = [
    ...(entry.kind ? [`kind=${entry.kind}`] : []),
    ...(entry.resourceId ? [`resource=${entry.resourceId}`] : []),
  ];
  if (context.length > 0) parts.push(paint(DIM, `(${context.join(" ")})`));

  if (entry.metadata && Object.keys(entry.metadata).length > 0) {
    parts.push(paint(DIM, JSON.stringify(entry.metadata)));
  }

  return parts.join(" ");
}

// =============================================================================
// Transports
// =============================================================================

/**
 * Writes to stderr so that machine-readable output on stdout stays clean.
 */
export class ConsoleTransport implements LogTransport {
  name = "console";
  private colors: boolean;

  constructor(options: { colors?: boolean } = {}) {
    this.colors = options.colors ?? process.stderr.isTTY ?? false;
  }

  write(entry: AuditLogEntry): void {
    const formatted = formatLogEntry(entry, { colors: this.colors });
    if (entry.level === "error") {
      console.error(formatted);
    } else if (entry.level === "warn") {
      console.warn(formatted);
    } else {
      process.stderr.write(`${formatted}\n`);
    }
  }
}

/** Keeps entries in memory, for tests and for callers that attach logs to a report. */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: AuditLogEntry[] = [];

  write(entry: AuditLogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: AuditLogLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class AuditLoggerImpl implements AuditLogger {
  readonly subsystem: string;
  private level: AuditLogLevel;
  private transports: LogTransport[];
  private context: LogContext;

  constructor(options: {
    subsystem: string;
    level?: AuditLogLevel;
    transports?: LogTransport[];
    context?: LogContext;
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
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

  child(name: string): AuditLogger {
    return this.derive(`${this.subsystem}/${name}`, this.context);
  }

  withContext(context: LogContext): AuditLogger {
    return this.derive(this.subsystem, { ...this.context, ...context });
  }

  setLevel(level: AuditLogLevel): void {
    this.level = level;
  }

  getLevel(): AuditLogLevel {
    return this.level;
  }

  private derive(subsystem: string, context: LogContext): AuditLogger {
    return new AuditLoggerImpl({ subsystem, level: this.level, transports: this.transports, context });
  }

  private log(level: AuditLogLevel, message: string, meta?: Record<string, unknown>): void {
    if (levelRank(level) < levelRank(this.level)) return;

    const entry: AuditLogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message,
      metadata: meta,
      kind: this.context.kind,
      resourceId: this.context.resourceId,
    };

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }
}

// =============================================================================
// Logger Factory
// =============================================================================

export function createAuditLogger(
  subsystem: string,
  options?: { level?: AuditLogLevel; transports?: LogTransport[] },
): AuditLogger {
  return new AuditLoggerImpl({
    subsystem: `finops-audit/${subsystem}`,
    level: options?.level,
    transports: options?.transports,
  });
}

let globalLogger: AuditLogger | null = null;

/** The process-wide audit logger, created on first use. */
export function getAuditLogger(): AuditLogger {
  globalLogger ??= new AuditLoggerImpl({ subsystem: "finops-audit" });
  return globalLogger;
}

export function setAuditLogger(logger: AuditLogger | null): void {
  globalLogger = logger;
}
