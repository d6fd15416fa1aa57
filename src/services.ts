import type { Config } from './config.js';
import type { Logger } from './logger.js';
import { buildSystemPrompt } from './codegen/prompt.js';
import { ModelCodeGenerator, OpenAICompletionService } from './codegen/client.js';
import { ExecutionDispatcher } from './execution/dispatcher.js';
import { ScriptBackend, ShellBackend } from './execution/backends.js';
import { RetryController } from './runner/retryController.js';
import { FileRunStore } from './store/runStore.js';
import type { AppServices } from './app.js';

/** Wire the production collaborators from configuration. */
export function buildServices(config: Config, logger: Logger): AppServices {
  const { prompt, templateHash } = buildSystemPrompt(config.sandboxRoot, config.promptAppend);
  logger.info('System prompt loaded', { template_hash: templateHash, model: config.model });

  const completion = new OpenAICompletionService({
    apiKey: config.apiToken,
    baseURL: config.apiBase,
    model: config.model,
    timeoutMs: config.generationTimeoutMs,
  });
  const generator = new ModelCodeGenerator(completion, prompt, logger.child('codegen'));

  const backendOptions = { cwd: config.sandboxRoot, timeoutMs: config.execTimeoutMs };
  const dispatcher = new ExecutionDispatcher(
    {
      script: new ScriptBackend(config.scriptBin, backendOptions),
      shell: new ShellBackend(config.shellBin, backendOptions),
    },
    logger.child('exec'),
  );

  const store = new FileRunStore(config.sandboxRoot);
  const controller = new RetryController(generator, dispatcher, store, logger.child('run'));

  return { controller, store, logger };
}
