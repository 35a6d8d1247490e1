/**
 * @fileoverview Structured logger for the orchestrator.
 *
 * Every entry is a plain JSON-serializable object carrying the module that
 * wrote it, the run it belongs to and any bound fields, so a single query
 * can be followed across the loop, the registry and the model client.
 *
 * @module rag-orchestrator/observability/logger
 * @version 0.1.0
 */

import { v4 as uuidv4 } from 'uuid';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { Severity, createTimestamp, createUniqueId } from '../types/core.types.js';

/**
 * A structured log entry.
 */
export interface LogEntry {
  readonly id: UniqueId;
  readonly timestamp: Timestamp;
  readonly level: Severity;
  readonly message: string;

  /** Module that generated the log */
  readonly module: string;

  /** Run (query) the entry belongs to, if any */
  readonly runId: UniqueId | null;

  /** Bound fields merged with per-call data */
  readonly data: Readonly<Record<string, unknown>>;

  readonly error: LogError | null;
  readonly durationMs: number | null;
}

export interface LogError {
  readonly name: string;
  readonly message: string;
  readonly stack: string | undefined;
  readonly code: string | undefined;
}

/**
 * Transport for outputting logs.
 */
export interface LogTransport {
  readonly name: string;
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  readonly minLevel: Severity;
  readonly module: string;
  readonly transports: ReadonlyArray<LogTransport>;
  readonly runId?: UniqueId | undefined;

  /** Fields added to every entry */
  readonly fields?: Readonly<Record<string, unknown>> | undefined;
}

const SEVERITY_ORDER: Record<Severity, number> = {
  [Severity.DEBUG]: 0,
  [Severity.INFO]: 1,
  [Severity.WARN]: 2,
  [Severity.ERROR]: 3,
  [Severity.FATAL]: 4,
};

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: Severity.INFO,
  module: 'rag-orchestrator',
  transports: [],
};

/**
 * Console transport. Writes to stderr so stdout stays free for answers.
 */
export class ConsoleTransport implements LogTransport {
  readonly name = 'console';

  constructor(private readonly useColors: boolean = process.stderr.isTTY === true) {}

  write(entry: LogEntry): void {
    const prefix = this.formatPrefix(entry);
    const data = Object.keys(entry.data).length > 0 ? ` ${JSON.stringify(entry.data)}` : '';
    const duration = entry.durationMs !== null ? ` (${entry.durationMs}ms)` : '';
    const error = entry.error ? `\n  ${entry.error.name}: ${entry.error.message}` : '';
    process.stderr.write(`${prefix} ${entry.message}${duration}${data}${error}\n`);
  }

  private formatPrefix(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toISOString();
    const level = entry.level.padEnd(5);

    if (this.useColors) {
      const color = this.getLevelColor(entry.level);
      return `\x1b[90m${timestamp}\x1b[0m ${color}${level}\x1b[0m \x1b[36m[${entry.module}]\x1b[0m`;
    }

    return `${timestamp} ${level} [${entry.module}]`;
  }

  private getLevelColor(level: Severity): string {
    switch (level) {
      case Severity.DEBUG: return '\x1b[90m';
      case Severity.INFO: return '\x1b[32m';
      case Severity.WARN: return '\x1b[33m';
      case Severity.ERROR: return '\x1b[31m';
      case Severity.FATAL: return '\x1b[35m';
    }
  }
}

/**
 * Memory transport - stores logs in memory for testing/debugging.
 */
export class MemoryTransport implements LogTransport {
  readonly name = 'memory';

  private readonly entries: LogEntry[] = [];

  constructor(private readonly maxEntries: number = 1000) {}

  write(entry: LogEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  getEntries(): ReadonlyArray<LogEntry> {
    return [...this.entries];
  }

  clear(): void {
    this.entries.length = 0;
  }

  findByRunId(runId: UniqueId): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.runId === runId);
  }
}

/**
 * Structured, leveled logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger('agent.orchestrator', { minLevel: Severity.DEBUG });
 * const runLogger = logger.child({ runId });
 * runLogger.info('Round started', { round: 0 });
 * ```
 */
export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    const merged = { ...DEFAULT_CONFIG, ...config };
    this.config = merged.transports.length === 0
      ? { ...merged, transports: [new ConsoleTransport()] }
      : merged;
  }

  get module(): string {
    return this.config.module;
  }

  get minLevel(): Severity {
    return this.config.minLevel;
  }

  /**
   * Creates a child logger sharing this logger's transports.
   */
  child(context: {
    module?: string;
    runId?: UniqueId;
    fields?: Record<string, unknown>;
  }): Logger {
    return new Logger({
      minLevel: this.config.minLevel,
      module: context.module ?? this.config.module,
      transports: this.config.transports,
      runId: context.runId ?? this.config.runId,
      fields: { ...this.config.fields, ...context.fields },
    });
  }

  isEnabled(level: Severity): boolean {
    return SEVERITY_ORDER[level] >= SEVERITY_ORDER[this.config.minLevel];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.DEBUG, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.INFO, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.WARN, message, data);
  }

  error(message: string, data?: Record<string, unknown>, error?: unknown): void {
    this.log(Severity.ERROR, message, data, error);
  }

  /**
   * Times an async operation and logs its duration; failures are logged
   * at ERROR and rethrown.
   */
  async time<T>(
    label: string,
    fn: () => Promise<T>,
    level: Severity = Severity.DEBUG,
  ): Promise<T> {
    const start = Date.now();
    try {
      const result = await fn();
      this.log(level, `${label} completed`, undefined, undefined, Date.now() - start);
      return result;
    } catch (error) {
      this.log(Severity.ERROR, `${label} failed`, undefined, error, Date.now() - start);
      throw error;
    }
  }

  // ============ Private Methods ============

  private log(
    level: Severity,
    message: string,
    data?: Record<string, unknown>,
    error?: unknown,
    durationMs?: number,
  ): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      id: createUniqueId(uuidv4()),
      timestamp: createTimestamp(),
      level,
      message,
      module: this.config.module,
      runId: this.config.runId ?? null,
      data: { ...this.config.fields, ...data },
      error: error === undefined ? null : formatError(error),
      durationMs: durationMs ?? null,
    };

    for (const transport of this.config.transports) {
      try {
        transport.write(entry);
      } catch (transportError) {
        process.stderr.write(
          `Logger transport '${transport.name}' failed: ${formatError(transportError).message}\n`,
        );
      }
    }
  }
}

function formatError(error: unknown): LogError {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      code,
    };
  }
  return {
    name: 'NonError',
    message: String(error),
    stack: undefined,
    code: undefined,
  };
}

/**
 * Creates a logger for a specific module.
 */
export function createLogger(module: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({ ...config, module });
}

/**
 * Parses a level name such as "debug" or "WARN".
 */
export function parseSeverity(value: string): Severity | null {
  const upper = value.trim().toUpperCase();
  for (const level of Object.values(Severity)) {
    if (level === upper) return level;
  }
  return null;
}
