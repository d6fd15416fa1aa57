export const APPLICATION_TYPES = ['script', 'shell'] as const;

export type ApplicationType = (typeof APPLICATION_TYPES)[number];

/** Code produced by one generation attempt. */
export interface Artifact {
  application_type: ApplicationType;
  code: string;
}

export interface ExecutionResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  spawnError?: string;
}

export interface ExecutionBackend {
  readonly type: ApplicationType;
  /** Runs the code in a fresh process. Resolves with whatever the process produced. */
  run(code: string): Promise<ExecutionResult>;
}
