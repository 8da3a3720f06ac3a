import { appendFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { LogLevel, LogEntry, LogContext, RunEvent } from './events.js';

export interface LoggerOptions {
  /** Base directory for log files. */
  logDir: string;
  /** Minimum log level to output. */
  level: LogLevel;
  /** Whether to also print to console. */
  console: boolean;
  /** Source identifier for this logger instance. */
  source: string;
  /** Ticket every entry of this logger is attributed to. */
  ticketId?: number;
}

/**
 * Minimal logger contract the pipeline components depend on.
 */
export interface LoggerLike {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger implements LoggerLike {
  private readonly opts: LoggerOptions;
  private readonly logFile: string;
  private initPromise: Promise<unknown> | null = null;
  private fileWriteFailed = false;

  constructor(opts: Partial<LoggerOptions> & { source: string }) {
    this.opts = {
      logDir: opts.logDir ?? 'logs',
      level: opts.level ?? 'info',
      console: opts.console ?? true,
      source: opts.source,
      ticketId: opts.ticketId,
    };
    this.logFile = join(this.opts.logDir, `${this.opts.source}.log`);
  }

  private async ensureDir(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = mkdir(dirname(this.logFile), { recursive: true });
    }
    await this.initPromise;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.opts.level];
  }

  formatConsole(entry: LogEntry): string {
    const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
    const levelTag = entry.level.toUpperCase().padEnd(5);
    const ctx = [
      entry.ticketId != null ? `#${entry.ticketId}` : null,
      entry.repoId != null && entry.requestId != null ? `${entry.repoId}!${entry.requestId}` : null,
    ]
      .filter(Boolean)
      .join(' ');
    const ctxStr = ctx ? ` [${ctx}]` : '';
    return `${ts} ${levelTag} [${entry.source}]${ctxStr} ${entry.message}`;
  }

  private async writeEntry(entry: LogEntry): Promise<void> {
    if (!this.shouldLog(entry.level)) return;

    if (this.opts.console) {
      const formatted = this.formatConsole(entry);
      if (entry.level === 'error') {
        console.error(formatted);
      } else if (entry.level === 'warn') {
        console.warn(formatted);
      } else {
        console.log(formatted);
      }
    }

    try {
      await this.ensureDir();
      const line = JSON.stringify(entry) + '\n';
      await appendFile(this.logFile, line, 'utf-8');
    } catch (err) {
      // Reported once; the run carries on with console output only.
      if (!this.fileWriteFailed) {
        this.fileWriteFailed = true;
        const reason = err instanceof Error ? err.message : String(err);
        console.error(`Could not write log file ${this.logFile}: ${reason}`);
      }
    }
  }

  buildEntry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      source: this.opts.source,
      message,
      ...(this.opts.ticketId != null ? { ticketId: this.opts.ticketId } : {}),
      ...context,
    };
  }

  debug(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('debug', message, context));
  }

  info(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('warn', message, context));
  }

  error(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('error', message, context));
  }

  /**
   * Log a structured event.
   */
  event(event: RunEvent, level: LogLevel = 'info'): void {
    void this.writeEntry(
      this.buildEntry(level, event.type, {
        data: { ...event },
      }),
    );
  }

  /**
   * Create a child logger whose entries carry the given ticket. It shares
   * the parent's log file.
   */
  child(ticketId: number): Logger {
    return new Logger({ ...this.opts, ticketId });
  }
}
