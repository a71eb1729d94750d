export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  scope?: string;
  message: string;
  timestamp: string;
  meta?: unknown;
}

export type LogSink = (entry: LogEntry, line: string) => void;

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Level and sink are shared by the root logger and every scoped child, so
 * `setLevel` in a CLI entry point applies to all services.
 */
interface LoggerState {
  minLevel: LogLevel;
  sink: LogSink;
}

const consoleSink: LogSink = (entry, line) => {
  switch (entry.level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'debug':
      console.debug(line);
      break;
  }
};

export class Logger {
  constructor(
    private readonly state: LoggerState = { minLevel: 'info', sink: consoleSink },
    private readonly scope?: string
  ) {}

  /**
   * Logger whose lines carry `[scope]` after the level.
   */
  child(scope: string): Logger {
    return new Logger(this.state, this.scope ? `${this.scope}:${scope}` : scope);
  }

  setLevel(level: LogLevel): void {
    this.state.minLevel = level;
  }

  /** Replace the output target; returns the previous one. */
  setSink(sink: LogSink): LogSink {
    const previous = this.state.sink;
    this.state.sink = sink;
    return previous;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.state.minLevel);
  }

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      level,
      scope: this.scope,
      message,
      timestamp: new Date().toISOString(),
      meta,
    };

    const scopeTag = entry.scope ? ` [${entry.scope}]` : '';
    const metaStr = meta === undefined ? '' : ` ${formatMeta(meta)}`;
    this.state.sink(entry, `[${entry.timestamp}] [${level.toUpperCase()}]${scopeTag} ${message}${metaStr}`);
  }

  debug(message: string, meta?: unknown): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log('error', message, meta);
  }

  /**
   * Single-line progress bar for long CLI loops (archive migration).
   */
  progress(current: number, total: number, label: string): void {
    const percentage = total > 0 ? Math.round((current / total) * 100) : 100;
    const filled = Math.floor(percentage / 2);
    process.stdout.write(`\r[${'='.repeat(filled)}${' '.repeat(50 - filled)}] ${percentage}% - ${label} (${current}/${total})`);
    if (current >= total) {
      process.stdout.write('\n');
    }
  }
}

function formatMeta(meta: unknown): string {
  if (meta instanceof Error) return JSON.stringify({ error: meta.message });
  if (typeof meta === 'string') return meta;
  return JSON.stringify(meta);
}

export const logger = new Logger();
