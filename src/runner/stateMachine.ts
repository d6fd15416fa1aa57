import { buildRetryTask } from '../codegen/prompt.js';
import type { ExecutionFailure } from '../errors.js';
import type { Artifact, ExecutionResult } from '../execution/types.js';

export const MAX_ATTEMPTS = 2;

export type RunState =
  | { kind: 'generating'; attempt: number; task: string }
  | { kind: 'executing'; attempt: number; task: string; artifact: Artifact }
  | { kind: 'succeeded'; attempt: number; artifact: Artifact; result: ExecutionResult }
  | { kind: 'failed'; attempt: number; error: unknown; artifact?: Artifact };

export type TerminalState = Extract<RunState, { kind: 'succeeded' | 'failed' }>;

export type RunEvent =
  | { kind: 'generated'; artifact: Artifact }
  | { kind: 'generation-failed'; error: unknown }
  | { kind: 'executed'; result: ExecutionResult }
  | { kind: 'execution-failed'; failure: ExecutionFailure }
  | { kind: 'crashed'; error: unknown };

export function initialState(task: string): RunState {
  return { kind: 'generating', attempt: 1, task };
}

export function isTerminal(state: RunState): state is TerminalState {
  return state.kind === 'succeeded' || state.kind === 'failed';
}

/**
 * Next state for an event. Only an execution failure below the attempt limit
 * loops back to generating; every other failure ends the run.
 * `originalTask` is what retries are built from, never an already amended task.
 */
export function transition(state: RunState, event: RunEvent, originalTask: string): RunState {
  if (event.kind === 'crashed') {
    return {
      kind: 'failed',
      attempt: state.attempt,
      error: event.error,
      artifact: state.kind === 'executing' ? state.artifact : undefined,
    };
  }

  switch (state.kind) {
    case 'generating':
      if (event.kind === 'generated') {
        return { kind: 'executing', attempt: state.attempt, task: state.task, artifact: event.artifact };
      }
      if (event.kind === 'generation-failed') {
        return { kind: 'failed', attempt: state.attempt, error: event.error };
      }
      break;

    case 'executing':
      if (event.kind === 'executed') {
        return { kind: 'succeeded', attempt: state.attempt, artifact: state.artifact, result: event.result };
      }
      if (event.kind === 'execution-failed') {
        if (state.attempt >= MAX_ATTEMPTS) {
          return { kind: 'failed', attempt: state.attempt, error: event.failure, artifact: state.artifact };
        }
        return {
          kind: 'generating',
          attempt: state.attempt + 1,
          task: buildRetryTask(originalTask, state.artifact.code, event.failure.stderr),
        };
      }
      break;

    case 'succeeded':
    case 'failed':
      return state;
  }

  throw new Error(`Event "${event.kind}" is not valid in state "${state.kind}"`);
}
