import { ExecutionFailure, InterpreterUnavailableError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { ApplicationType, Artifact, ExecutionBackend, ExecutionResult } from './types.js';

export type BackendSet = { readonly [K in ApplicationType]: ExecutionBackend };

/**
 * Routes an artifact to the backend for its application type.
 * A zero exit status is success; anything else is thrown as ExecutionFailure,
 * except a process that never started, which is InterpreterUnavailableError.
 */
export class ExecutionDispatcher {
  constructor(
    private readonly backends: BackendSet,
    private readonly logger: Logger,
  ) {}

  async execute(artifact: Artifact): Promise<ExecutionResult> {
    const backend = this.backends[artifact.application_type];
    const started = Date.now();
    const result = await backend.run(artifact.code);

    this.logger.debug('Execution finished', {
      application_type: artifact.application_type,
      exit_code: result.exitCode,
      timed_out: result.timedOut,
      duration_ms: Date.now() - started,
    });

    if (result.spawnError !== undefined) {
      throw new InterpreterUnavailableError(result.spawnError);
    }
    if (result.timedOut || result.exitCode !== 0) {
      throw new ExecutionFailure(result);
    }
    return result;
  }
}
