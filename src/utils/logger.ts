// src/utils/logger.ts
/* Console logger with bracketed scope tags, e.g.
 *   [2026-01-01 10:00:00] [INFO] [OUTBOX] Processing 3 pending jobs
 * The level threshold is shared by every scope and set once at boot.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const v = String(raw ?? '').trim().toLowerCase();
  if (v === 'warning') return 'warn';
  if (v === 'debug' || v === 'info' || v === 'warn' || v === 'error') return v;
  return fallback;
}

export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  // eslint-disable-next-line no-console
  if (level === 'error') console.error(line);
  // eslint-disable-next-line no-console
  else if (level === 'warn') console.warn(line);
  // eslint-disable-next-line no-console
  else console.log(line);
};

let threshold: LogLevel = 'info';
let sink: LogSink = consoleSink;

export function configureLogging(opts: { level?: LogLevel; sink?: LogSink }): void {
  if (opts.level) threshold = opts.level;
  if (opts.sink) sink = opts.sink;
}

export function resetLogging(): void {
  threshold = 'info';
  sink = consoleSink;
}

const pad = (n: number) => String(n).padStart(2, '0');

function stamp(d = new Date()): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

export class Logger {
  private readonly tag: string;

  constructor(scope: string) {
    this.tag = `[${String(scope).trim().toUpperCase()}]`;
  }

  child(scope: string): Logger {
    return new Logger(`${this.tag.slice(1, -1)}:${scope}`);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
  }

  debug(msg: string): void { this.emit('debug', msg); }
  info(msg: string): void { this.emit('info', msg); }
  warn(msg: string): void { this.emit('warn', msg); }
  error(msg: string, err?: unknown): void {
    const detail = err instanceof Error ? ` (${err.stack ?? err.message})` : '';
    this.emit('error', `${msg}${detail}`);
  }

  private emit(level: LogLevel, msg: string): void {
    if (!this.isEnabled(level)) return;
    sink(level, `[${stamp()}] [${level.toUpperCase()}] ${this.tag} ${msg}`);
  }
}
