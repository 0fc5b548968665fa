import type { LogEntry, LogLevel, Sink } from '../logger.js';

export interface ConsoleSinkOptions {
  color?: boolean | undefined;
  /** Lines held before they are written out unprompted. Defaults to 50. */
  maxPending?: number | undefined;
  /** Defaults to stderr so stdout stays reserved for command output. */
  stream?: NodeJS.WritableStream | undefined;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

/**
 * Line-oriented console sink.
 * Lines are held until flush(), an error entry, or `maxPending` lines, then written in one chunk.
 *
 * Format: [HH:MM:SS] LEVEL [category] message {key=value, ...}
 */
export class ConsoleSink implements Sink {
  private readonly color: boolean;
  private readonly maxPending: number;
  private readonly stream: NodeJS.WritableStream;
  private pending: string[] = [];

  constructor(options?: ConsoleSinkOptions) {
    this.color = options?.color ?? false;
    this.maxPending = Math.max(1, options?.maxPending ?? 50);
    this.stream = options?.stream ?? process.stderr;
  }

  write(entry: LogEntry): void {
    this.pending.push(this.formatLine(entry));
    if (entry.level === 'error' || this.pending.length >= this.maxPending) {
      this.flush();
    }
  }

  flush(): void {
    if (this.pending.length === 0) return;
    const chunk = this.pending.join('');
    this.pending = [];
    this.stream.write(chunk);
  }

  private formatLine(entry: LogEntry): string {
    const level = entry.level.toUpperCase().padEnd(5);
    const coloured = this.color ? `${LEVEL_COLORS[entry.level]}${level}\x1b[0m` : level;
    const context = entry.context ? ` ${formatContext(entry.context)}` : '';
    return `${formatTime(entry.timestamp)} ${coloured} [${entry.category}] ${entry.msg}${context}\n`;
  }
}

function formatTime(timestamp: Date): string {
  const parts = [timestamp.getHours(), timestamp.getMinutes(), timestamp.getSeconds()];
  return `[${parts.map((part) => String(part).padStart(2, '0')).join(':')}]`;
}

function formatContext(context: Record<string, unknown>): string {
  const pairs = Object.entries(context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  return `{${pairs.join(', ')}}`;
}
