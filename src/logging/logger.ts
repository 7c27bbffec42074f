/**
 * Lab Logging
 *
 * Subsystem logger with levels, contextual fields, pluggable transports
 * and secret redaction.
 */

import { createWriteStream, type WriteStream } from "node:fs";

// =============================================================================
// Logger Types
// =============================================================================

export type LabLogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type LabLogEntry = {
  timestamp: Date;
  level: LabLogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  node?: string;
  stepId?: string;
  planId?: string;
  duration?: number;
};

export type LogFormatter = (entry: LabLogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LabLogEntry): void;
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

export interface LabLogger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): LabLogger;
  withContext(context: LogContext): LabLogger;
  setLevel(level: LabLogLevel): void;
  getLevel(): LabLogLevel;
  isLevelEnabled(level: LabLogLevel): boolean;
}

export type LogContext = {
  node?: string;
  stepId?: string;
  planId?: string;
};

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LabLogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function isLogLevel(value: string): value is LabLogLevel {
  return Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

export function compareLogLevels(a: LabLogLevel, b: LabLogLevel): -1 | 0 | 1 {
  const pa = LOG_LEVEL_PRIORITY[a];
  const pb = LOG_LEVEL_PRIORITY[b];
  if (pa < pb) return -1;
  if (pa > pb) return 1;
  return 0;
}

export function shouldLog(level: LabLogLevel, minLevel: LabLogLevel): boolean {
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

const LEVEL_COLORS: Record<LabLogLevel, string> = {
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

  const paint = (color: string, text: string) => (colors ? `${color}${text}${COLORS.reset}` : text);

  return (entry: LabLogEntry): string => {
    const parts: string[] = [];

    if (timestamps) parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.planId) contextParts.push(`plan=${entry.planId}`);
    if (entry.stepId) contextParts.push(`step=${entry.stepId}`);
    if (entry.node) contextParts.push(`node=${entry.node}`);
    if (entry.duration !== undefined) contextParts.push(`duration=${entry.duration}ms`);
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
  private minLevel: LabLogLevel;

  constructor(options?: { formatter?: LogFormatter; minLevel?: LabLogLevel }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
    this.minLevel = options?.minLevel ?? "trace";
  }

  write(entry: LabLogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;

    // Log output goes to stderr so command results on stdout stay parseable.
    const formatted = this.formatter(entry);
    if (entry.level === "error" || entry.level === "fatal") {
      console.error(formatted);
    } else if (entry.level === "warn") {
      console.warn(formatted);
    } else {
      process.stderr.write(`${formatted}\n`);
    }
  }
}

/**
 * Append-only file transport. Lines are buffered and written on flush.
 */
export class FileTransport implements LogTransport {
  name = "file";
  private formatter: LogFormatter;
  private minLevel: LabLogLevel;
  private buffer: string[] = [];
  private bufferSize: number;
  private filePath: string;
  private stream: WriteStream | null = null;

  constructor(options: {
    filePath: string;
    formatter?: LogFormatter;
    minLevel?: LabLogLevel;
    bufferSize?: number;
  }) {
    this.filePath = options.filePath;
    this.formatter = options.formatter ?? createDefaultFormatter({ colors: false });
    this.minLevel = options.minLevel ?? "debug";
    this.bufferSize = options.bufferSize ?? 50;
  }

  write(entry: LabLogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;

    this.buffer.push(this.formatter(entry));
    if (this.buffer.length >= this.bufferSize) {
      this.flush().catch((err: unknown) => {
        console.error(`log file ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`);
      });
    }
  }

  async flush(): Promise<void> {
    if (this.buffer.length === 0) return;
    if (!this.stream) this.stream = createWriteStream(this.filePath, { flags: "a" });

    const content = `${this.buffer.join("\n")}\n`;
    this.buffer = [];
    const stream = this.stream;
    await new Promise<void>((resolve, reject) => {
      stream.write(content, (err) => (err ? reject(err) : resolve()));
    });
  }

  async close(): Promise<void> {
    await this.flush();
    const stream = this.stream;
    this.stream = null;
    if (stream) await new Promise<void>((resolve) => stream.end(resolve));
  }
}

/**
 * Keeps entries in memory. Used by tests and by `--json` output modes.
 */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: LabLogEntry[] = [];

  write(entry: LabLogEntry): void {
    this.entries.push(entry);
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class LabLoggerImpl implements LabLogger {
  readonly subsystem: string;
  private level: LabLogLevel;
  private transports: LogTransport[];
  private context: LogContext;
  private redactPatterns: RegExp[];

  constructor(options: {
    subsystem: string;
    level?: LabLogLevel;
    transports?: LogTransport[];
    context?: LogContext;
    redactPatterns?: RegExp[];
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
    this.redactPatterns = options.redactPatterns ?? [];
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

  child(name: string): LabLogger {
    return new LabLoggerImpl({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
      context: this.context,
      redactPatterns: this.redactPatterns,
    });
  }

  withContext(context: LogContext): LabLogger {
    return new LabLoggerImpl({
      subsystem: this.subsystem,
      level: this.level,
      transports: this.transports,
      context: { ...this.context, ...context },
      redactPatterns: this.redactPatterns,
    });
  }

  /** Add a literal value (a password, a token) that must never reach a transport. */
  addSecret(secret: string): void {
    if (secret.length === 0) return;
    this.redactPatterns.push(new RegExp(escapeRegExp(secret), "g"));
  }

  setLevel(level: LabLogLevel): void {
    this.level = level;
  }

  getLevel(): LabLogLevel {
    return this.level;
  }

  isLevelEnabled(level: LabLogLevel): boolean {
    return shouldLog(level, this.level);
  }

  async close(): Promise<void> {
    for (const transport of this.transports) {
      await transport.close?.();
    }
  }

  private log(level: LabLogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const entry: LabLogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.redact(message),
      metadata: meta ? this.redactObject(meta) : undefined,
      node: this.context.node,
      stepId: this.context.stepId,
      planId: this.context.planId,
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

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// =============================================================================
// Logger Factory
// =============================================================================

export type LoggerOptions = {
  level?: LabLogLevel;
  file?: string;
  secrets?: string[];
  colors?: boolean;
};

export function createLabLogger(subsystem: string, options?: LoggerOptions): LabLoggerImpl {
  const transports: LogTransport[] = [
    new ConsoleTransport({ formatter: createDefaultFormatter({ colors: options?.colors, timestamps: false }) }),
  ];
  if (options?.file) {
    transports.push(new FileTransport({ filePath: options.file }));
  }

  const logger = new LabLoggerImpl({
    subsystem,
    level: options?.level ?? "info",
    transports,
  });
  for (const secret of options?.secrets ?? []) logger.addSecret(secret);
  return logger;
}

let globalLogger: LabLoggerImpl | null = null;

/**
 * Get or create the process-wide logger.
 */
export function getLabLogger(subsystem?: string): LabLogger {
  if (!globalLogger) {
    globalLogger = createLabLogger("s2dlab");
  }
  return subsystem ? globalLogger.child(subsystem) : globalLogger;
}

export function setGlobalLabLogger(logger: LabLoggerImpl): void {
  globalLogger = logger;
}
