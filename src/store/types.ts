import type { ErrorCategory } from '../errors.js';
import type { ApplicationType } from '../execution/types.js';

/** Reply returned to the caller of a successful run. */
export interface RunOutcome {
  status: 'success';
  output: string;
  error: string;
}

/** Snapshot of the most recent successful run. */
export interface RunRecord {
  run_id: string;
  task: string;
  application_type: ApplicationType;
  code: string;
  attempt: number;
  output: RunOutcome;
  completed_at: string;
}

export interface ErrorEntry {
  category: ErrorCategory;
  detail: string;
  run_id?: string;
  time?: Date;
}

export interface RunStore {
  /** Replaces the previous record. */
  saveLastResult(record: RunRecord): Promise<void>;
  getLastResult(): Promise<RunRecord | null>;
  /** Appends one line to the error log. */
  appendError(entry: ErrorEntry): Promise<void>;
}
