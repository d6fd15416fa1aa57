import { v4 as uuidv4 } from 'uuid';
import type { CodeGenerator } from '../codegen/client.js';
import type { ExecutionDispatcher } from '../execution/dispatcher.js';
import {
  ExecutionFailure,
  GenerationError,
  TaskFailedError,
  errorMessage,
  type ErrorCategory,
} from '../errors.js';
import type { Logger } from '../logger.js';
import type { RunOutcome, RunStore } from '../store/types.js';
import {
  initialState,
  isTerminal,
  transition,
  type RunEvent,
  type RunState,
  type TerminalState,
} from './stateMachine.js';

type ActiveState = Exclude<RunState, TerminalState>;

export interface RunTaskResult {
  runId: string;
  outcome: RunOutcome;
}

/**
 * Drives one task from generation to a terminal state, persisting the result
 * or the failure on the way out.
 */
export class RetryController {
  constructor(
    private readonly generator: CodeGenerator,
    private readonly dispatcher: ExecutionDispatcher,
    private readonly store: RunStore,
    private readonly logger: Logger,
  ) {}

  async run(task: string, runId: string = uuidv4()): Promise<RunTaskResult> {
    const log = this.logger.child(runId.slice(0, 8));
    log.info('Task received', { run_id: runId, task });

    let state: RunState = initialState(task);
    while (!isTerminal(state)) {
      const event = await this.perform(state, log);
      state = transition(state, event, task);
    }

    if (state.kind === 'succeeded') {
      const outcome: RunOutcome = {
        status: 'success',
        output: state.result.stdout.trim(),
        error: state.result.stderr.trim(),
      };
      try {
        await this.store.saveLastResult({
          run_id: runId,
          task,
          application_type: state.artifact.application_type,
          code: state.artifact.code,
          attempt: state.attempt,
          output: outcome,
          completed_at: new Date().toISOString(),
        });
      } catch (err) {
        const detail = errorMessage(err);
        log.error('Saving last result failed', { attempt: state.attempt, detail });
        await this.store.appendError({ category: 'general', detail, run_id: runId });
        throw new TaskFailedError('general', detail, { cause: err });
      }
      log.info('Task succeeded', { attempt: state.attempt });
      return { runId, outcome };
    }

    const { category, detail } = describeFailure(state.error);
    log.error('Task failed', { attempt: state.attempt, category, detail });
    await this.store.appendError({ category, detail, run_id: runId });
    throw new TaskFailedError(category, detail, { cause: state.error });
  }

  private async perform(state: ActiveState, log: Logger): Promise<RunEvent> {
    switch (state.kind) {
      case 'generating':
        try {
          const artifact = await this.generator.generate(state.task, state.attempt);
          return { kind: 'generated', artifact };
        } catch (err) {
          return err instanceof GenerationError
            ? { kind: 'generation-failed', error: err }
            : { kind: 'crashed', error: err };
        }

      case 'executing':
        try {
          const result = await this.dispatcher.execute(state.artifact);
          return { kind: 'executed', result };
        } catch (err) {
          if (err instanceof ExecutionFailure) {
            log.warn('Execution failed', { attempt: state.attempt, stderr: err.stderr });
            return { kind: 'execution-failed', failure: err };
          }
          return { kind: 'crashed', error: err };
        }
    }
  }
}

function describeFailure(error: unknown): { category: ErrorCategory; detail: string } {
  if (error instanceof ExecutionFailure) {
    return { category: 'subprocess', detail: `Task execution failed: ${error.stderr}` };
  }
  if (error instanceof GenerationError) {
    return { category: error.category, detail: error.message };
  }
  return { category: 'general', detail: errorMessage(error) };
}
