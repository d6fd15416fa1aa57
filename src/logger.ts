import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * JSON replacer that serializes Error objects (whose properties are non-enumerable).
 */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    const obj: Record<string, unknown> = { message: value.message, name: value.name };
    if (value.stack) obj.stack = value.stack;
    return obj;
  }
  return value;
}

/**
 * Appends log lines to one file per day. Writes are chained so lines land in
 * the order they were logged.
 */
class DailyFileSink {
  private pending: Promise<void> = Promise.resolve();

  constructor(private readonly dir: string) {}

  write(line: string): void {
    const date = new Date().toISOString().slice(0, 10); // YYYY-MM-DD
    const file = join(this.dir, `app-${date}.log`);
    this.pending = this.pending
      .then(async () => {
        await mkdir(this.dir, { recursive: true });
        await appendFile(file, line + '\n', 'utf-8');
      })
      .catch((err: unknown) => {
        console.error(`Failed to write service log: ${err instanceof Error ? err.message : String(err)}`);
      });
  }

  flush(): Promise<void> {
    return this.pending;
  }
}

export class Logger {
  private level: LogLevel;

  private constructor(
    private readonly context: string,
    private readonly sink: DailyFileSink | null,
    level?: LogLevel,
  ) {
    const envLevel = process.env.LOG_LEVEL;
    this.level = level ?? (isLogLevel(envLevel) ? envLevel : 'info');
  }

  /** Console-only logger, optionally mirrored to `<logDir>/app-YYYY-MM-DD.log`. */
  static create(context: string, logDir?: string): Logger {
    return new Logger(context, logDir ? new DailyFileSink(logDir) : null);
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;
    const timestamp = new Date().toISOString();
    let line = `[${timestamp}] [${level.toUpperCase()}] [${this.context}] ${message}`;
    if (data !== undefined) {
      line += ` ${JSON.stringify(data, errorReplacer)}`;
    }
    console.error(line);
    this.sink?.write(line);
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`, this.sink, this.level);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /** Resolves once every line logged so far has reached the log file. */
  flush(): Promise<void> {
    return this.sink?.flush() ?? Promise.resolve();
  }
}
