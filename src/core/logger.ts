/**
 * logger.ts — Progress logger for the harvesting pipeline.
 *
 * Every line carries a timestamp, a level and the name of the module that
 * emitted it, e.g.
 *
 *   [2026-02-10T18:30:00.000Z] [INFO ] [IdCollector] Page 4: 20 new id(s), 80 total
 *
 * Level and file output are passed in by whoever builds the logger (the CLI);
 * core modules only receive a Logger instance through their constructors.
 */

import { appendFileSync } from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LoggerOptions {
  /** Minimum level that is emitted.  Defaults to `info`. */
  level?: LogLevel;
  /** When set, every emitted line is appended to this file as well. */
  file?: string;
  /** Replaces console output (tests capture lines through this). */
  sink?: (line: string, level: LogLevel) => void;
}

/**
 * Levelled, context-labelled line logger.
 *
 *   const logger = new Logger('PipelineDriver', { level: 'debug' });
 *   logger.info('tid=1042: saved 18211 byte(s) to TariffXML/Tariff_1042.xml');
 */
export class Logger {
  /** Module name shown in brackets on every line. */
  private readonly context: string;
  private readonly options: LoggerOptions;

  constructor(context: string, options: LoggerOptions = {}) {
    this.context = context;
    this.options = options;
  }

  /** Same level, file and sink, different label. */
  child(context: string): Logger {
    return new Logger(context, this.options);
  }

  // ── Public API ─────────────────────────────────────────

  /** Selector tried, poll result, attempt detail. */
  debug(message: string): void {
    this.emit('debug', message);
  }

  /** Routine progress: page visited, ids collected, artifact written. */
  info(message: string): void {
    this.emit('info', message);
  }

  /** Unexpected but non-fatal: a page with no new ids, a retried navigation. */
  warn(message: string): void {
    this.emit('warn', message);
  }

  /** A hard failure: activation control missing, retry budget exhausted. */
  error(message: string, err?: unknown): void {
    this.emit('error', message);
    if (err && !this.options.sink) {
      console.error(err);
    }
  }

  // ── Internals ──────────────────────────────────────────

  private emit(level: LogLevel, message: string): void {
    const threshold = this.options.level ?? 'info';
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;

    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5); // "INFO " / "WARN " / "ERROR"
    const line = `[${timestamp}] [${tag}] [${this.context}] ${message}`;

    if (this.options.file) {
      appendFileSync(this.options.file, line + '\n', 'utf8');
    }

    if (this.options.sink) {
      this.options.sink(line, level);
      return;
    }

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}

