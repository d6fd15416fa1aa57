import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { errnoCode } from '../errors.js';
import type { ErrorEntry, RunRecord, RunStore } from './types.js';

export const LAST_RESULT_FILE = path.join('logs', 'last_result.log');
export const ERROR_LOG_FILE = 'error.log';

/** Single error-log line; embedded newlines are escaped so one entry stays one line. */
export function formatErrorLine(entry: ErrorEntry): string {
  const time = (entry.time ?? new Date()).toISOString();
  const detail = entry.detail.replace(/\r?\n/g, '\\n');
  return `${time} [${entry.category}] ${entry.run_id ?? '-'} ${detail}\n`;
}

/**
 * File-backed store under the sandbox root. Every write to a given file goes
 * through that file's lock, so concurrent runs never interleave.
 */
export class FileRunStore implements RunStore {
  private readonly locks = new Map<string, Promise<void>>();
  private readonly lastResultPath: string;
  private readonly errorLogPath: string;

  constructor(private readonly baseDir: string) {
    this.lastResultPath = path.join(baseDir, LAST_RESULT_FILE);
    this.errorLogPath = path.join(baseDir, ERROR_LOG_FILE);
  }

  private withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.locks.get(key) ?? Promise.resolve();
    const next = prev.then(fn, fn);
    const cleanup = next.then(() => {}, () => {});
    this.locks.set(key, cleanup);
    void cleanup.then(() => {
      if (this.locks.get(key) === cleanup) {
        this.locks.delete(key);
      }
    });
    return next;
  }

  async saveLastResult(record: RunRecord): Promise<void> {
    return this.withLock(this.lastResultPath, async () => {
      await fs.mkdir(path.dirname(this.lastResultPath), { recursive: true });
      // Write-then-rename so readers never see a half-written record
      const tmpPath = `${this.lastResultPath}.${record.run_id}.tmp`;
      await fs.writeFile(tmpPath, JSON.stringify(record, null, 2), 'utf-8');
      await fs.rename(tmpPath, this.lastResultPath);
    });
  }

  async getLastResult(): Promise<RunRecord | null> {
    try {
      const data = await fs.readFile(this.lastResultPath, 'utf-8');
      return JSON.parse(data) as RunRecord;
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return null;
      throw err;
    }
  }

  async appendError(entry: ErrorEntry): Promise<void> {
    return this.withLock(this.errorLogPath, async () => {
      await fs.mkdir(this.baseDir, { recursive: true });
      await fs.appendFile(this.errorLogPath, formatErrorLine(entry), 'utf-8');
    });
  }
}

export class MemoryRunStore implements RunStore {
  private lastResult: RunRecord | null = null;
  readonly errorLines: string[] = [];

  async saveLastResult(record: RunRecord): Promise<void> {
    this.lastResult = structuredClone(record);
  }

  async getLastResult(): Promise<RunRecord | null> {
    return this.lastResult ? structuredClone(this.lastResult) : null;
  }

  async appendError(entry: ErrorEntry): Promise<void> {
    this.errorLines.push(formatErrorLine(entry));
  }
}
