/**
 * Logging
 *
 * The root logger owns one output (minimum level plus sinks). Child
 * loggers bind a component name or a run's trace id and write through
 * the same output, so `configureLogger` also reaches loggers that were
 * created before it was called.
 *
 *   const log = createComponentLogger('ReviewLoop').child({ traceId });
 *   log.info('Output approved', { attemptsUsed: 2 });
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import chalk from 'chalk';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Levels an entry can carry; `silent` only exists as a threshold. */
export type EntryLevel = Exclude<LogLevel, 'silent'>;

export interface LogEntry {
  timestamp: string;
  level: EntryLevel;
  message: string;
  component?: string;
  traceId?: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: LogSink[];
}

export interface LogBindings {
  component?: string;
  traceId?: string;
}

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

// =============================================================================
// SINKS
// =============================================================================

const LEVEL_STYLE: Record<EntryLevel, (text: string) => string> = {
  trace: chalk.gray,
  debug: chalk.cyan,
  info: chalk.green,
  warn: chalk.yellow,
  error: chalk.red.bold,
};

/**
 * One console line: time, level, component, short trace id, message, data.
 */
export function formatLogLine(entry: LogEntry): string {
  const parts = [
    chalk.dim(entry.timestamp.slice(11, 23)),
    LEVEL_STYLE[entry.level](entry.level.toUpperCase().padEnd(5)),
  ];
  if (entry.component) parts.push(chalk.magenta(`[${entry.component}]`));
  if (entry.traceId) parts.push(chalk.dim(`#${entry.traceId.slice(0, 8)}`));
  parts.push(entry.message);
  if (entry.data && Object.keys(entry.data).length > 0) {
    parts.push(chalk.dim(JSON.stringify(entry.data)));
  }
  return parts.join(' ');
}

/** Writes to stderr so CLI output on stdout stays clean. */
export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    console.error(formatLogLine(entry));
  }
}

/** Keeps entries in memory; used by tests to assert on what was logged. */
export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  /**
   * Entries at or above `level`, optionally narrowed to one run or component.
   */
  find(filter: { level?: EntryLevel; traceId?: string; component?: string } = {}): LogEntry[] {
    const minRank = rank(filter.level ?? 'trace');
    return this.entries.filter(
      (e) =>
        rank(e.level) >= minRank &&
        (filter.traceId === undefined || e.traceId === filter.traceId) &&
        (filter.component === undefined || e.component === filter.component)
    );
  }

  clear(): void {
    this.entries.length = 0;
  }
}

/** JSON lines appended to a file; the directory is created on first write. */
export class FileSink implements LogSink {
  private readonly filePath: string;
  private ready = false;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  write(entry: LogEntry): void {
    if (!this.ready) {
      mkdirSync(dirname(this.filePath), { recursive: true });
      this.ready = true;
    }
    appendFileSync(this.filePath, `${JSON.stringify(entry)}\n`);
  }
}

// =============================================================================
// LOGGER
// =============================================================================

export interface LogOutput {
  level: LogLevel;
  sinks: LogSink[];
}

export class StructuredLogger {
  private readonly output: LogOutput;
  private readonly bindings: LogBindings;

  constructor(output: LogOutput, bindings: LogBindings = {}) {
    this.output = output;
    this.bindings = bindings;
  }

  /** Logger writing through the same output with extra bindings. */
  child(bindings: LogBindings): StructuredLogger {
    return new StructuredLogger(this.output, { ...this.bindings, ...bindings });
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.emit('trace', message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.emit('error', message, data);
  }

  private emit(level: EntryLevel, message: string, data?: Record<string, unknown>): void {
    if (rank(level) < rank(this.output.level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.bindings,
      ...(data && { data }),
    };

    for (const sink of this.output.sinks) {
      try {
        sink.write(entry);
      } catch (err) {
        process.stderr.write(
          `logger: sink write failed: ${err instanceof Error ? err.message : String(err)}\n`
        );
      }
    }
  }
}

/**
 * Standalone logger with its own output, e.g. a `MemorySink` in tests.
 */
export function createLogger(config: LoggerConfig = {}): StructuredLogger {
  return new StructuredLogger({
    level: config.level ?? 'info',
    sinks: config.sinks ?? [new ConsoleSink()],
  });
}

// =============================================================================
// ROOT LOGGER
// =============================================================================

const rootOutput: LogOutput = { level: 'info', sinks: [new ConsoleSink()] };

export const logger = new StructuredLogger(rootOutput);

/**
 * Replace the root level and sinks. Component loggers follow.
 */
export function configureLogger(config: LoggerConfig): void {
  rootOutput.level = config.level ?? 'info';
  rootOutput.sinks = config.sinks ?? [new ConsoleSink()];
}

export function createComponentLogger(component: string): StructuredLogger {
  return logger.child({ component });
}
