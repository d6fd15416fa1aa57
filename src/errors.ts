import type { ExecutionResult } from './execution/types.js';

/** Tag written in front of every error log line. */
export type ErrorCategory = 'subprocess' | 'json-decode' | 'read' | 'general';

export class PathEscapeError extends Error {
  constructor(
    readonly requested: string,
    readonly reason: string,
  ) {
    super(`Access denied: ${reason}`);
    this.name = 'PathEscapeError';
  }
}

export type GenerationErrorKind = 'empty' | 'malformed' | 'upstream';

export class GenerationError extends Error {
  constructor(
    readonly kind: GenerationErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'GenerationError';
  }

  get category(): ErrorCategory {
    return this.kind === 'malformed' ? 'json-decode' : 'general';
  }
}

export class ExecutionFailure extends Error {
  constructor(readonly result: ExecutionResult) {
    super(
      result.timedOut
        ? 'Execution timed out'
        : `Execution exited with code ${result.exitCode}`,
    );
    this.name = 'ExecutionFailure';
  }

  get stderr(): string {
    const stderr = this.result.stderr.trim();
    if (!this.result.timedOut) return stderr;
    return stderr ? `${stderr}\nExecution timed out` : 'Execution timed out';
  }
}

export class ShellUnavailableError extends Error {
  constructor(readonly shell: string) {
    super(`Shell "${shell}" is not available on this host`);
    this.name = 'ShellUnavailableError';
  }
}

/** The backend's interpreter could not be started. */
export class InterpreterUnavailableError extends Error {
  constructor(readonly spawnError: string) {
    super(`Interpreter could not be started: ${spawnError}`);
    this.name = 'InterpreterUnavailableError';
  }
}

export type ReadFailureKind = 'not-found' | 'io';

export class ReadFailure extends Error {
  constructor(
    readonly kind: ReadFailureKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ReadFailure';
  }
}

/** Terminal failure of a run, after it has been written to the error log. */
export class TaskFailedError extends Error {
  readonly status = 500;

  constructor(
    readonly category: ErrorCategory,
    readonly detail: string,
    options?: { cause?: unknown },
  ) {
    super(detail, options);
    this.name = 'TaskFailedError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
