import type { CompletionService } from '../src/codegen/client.js';
import { ScriptBackend, ShellBackend } from '../src/execution/backends.js';
import { ExecutionDispatcher } from '../src/execution/dispatcher.js';
import { Logger } from '../src/logger.js';

/** Returns queued replies in order and records every request it saw. */
export class FakeCompletionService implements CompletionService {
  readonly calls: Array<{ system: string; user: string }> = [];
  private readonly replies: Array<string | Error>;

  constructor(replies: Array<string | Error>) {
    this.replies = [...replies];
  }

  async complete(system: string, user: string): Promise<string> {
    this.calls.push({ system, user });
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('FakeCompletionService: no reply queued');
    }
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

export function artifactReply(applicationType: string, code: string): string {
  return JSON.stringify({ application_type: applicationType, code });
}

export function quietLogger(): Logger {
  const logger = Logger.create('test');
  logger.setLevel('error');
  return logger;
}

/**
 * Dispatcher whose script backend is the running Node binary (`node -e`) and
 * whose shell backend is `sh`, so tests need no Python or bash.
 */
export function testDispatcher(cwd: string, shell = 'sh'): ExecutionDispatcher {
  const options = { cwd, timeoutMs: 10_000 };
  return new ExecutionDispatcher(
    {
      script: new ScriptBackend(process.execPath, options, '-e'),
      shell: new ShellBackend(shell, options),
    },
    quietLogger(),
  );
}
