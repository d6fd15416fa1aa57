import OpenAI from 'openai';
import { z } from 'zod';
import { GenerationError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { APPLICATION_TYPES, type Artifact } from '../execution/types.js';

/** One system + user exchange with a chat model, returning the raw reply text. */
export interface CompletionService {
  complete(system: string, user: string): Promise<string>;
}

export interface CodeGenerator {
  generate(task: string, attempt: number): Promise<Artifact>;
}

export interface OpenAICompletionOptions {
  apiKey: string;
  baseURL: string;
  model: string;
  timeoutMs: number;
  temperature?: number;
}

export class OpenAICompletionService implements CompletionService {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAICompletionOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      // Retrying is the caller's decision
      maxRetries: 0,
    });
  }

  async complete(system: string, user: string): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.options.model,
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: user },
      ],
      temperature: this.options.temperature ?? 0.2,
      response_format: { type: 'json_object' },
    });
    return response.choices[0]?.message?.content ?? '';
  }
}

const artifactSchema = z.object({
  application_type: z.enum(APPLICATION_TYPES),
  code: z.string().min(1),
});

/**
 * Parse a model reply into an artifact.
 * Throws GenerationError('empty') for blank replies and GenerationError('malformed')
 * for anything that is not JSON of the expected shape.
 */
export function parseArtifact(content: string): Artifact {
  const trimmed = content.trim();
  if (!trimmed) {
    throw new GenerationError('empty', 'Empty response from code generation service');
  }

  let json: unknown;
  try {
    json = JSON.parse(trimmed);
  } catch (err) {
    throw new GenerationError('malformed', 'Invalid JSON from code generation response', { cause: err });
  }

  const parsed = artifactSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new GenerationError('malformed', `Malformed code generation response: ${issues}`);
  }
  return parsed.data;
}

export class ModelCodeGenerator implements CodeGenerator {
  constructor(
    private readonly completion: CompletionService,
    private readonly systemPrompt: string,
    private readonly logger: Logger,
  ) {}

  async generate(task: string, attempt: number): Promise<Artifact> {
    this.logger.debug('Requesting code', { attempt, task_length: task.length });

    let content: string;
    try {
      content = await this.completion.complete(this.systemPrompt, task);
    } catch (err) {
      this.logger.error('Code generation call failed', { attempt, error: err });
      throw new GenerationError('upstream', `Code generation service unavailable: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const artifact = parseArtifact(content);
    this.logger.info('Code generated', {
      attempt,
      application_type: artifact.application_type,
      code_length: artifact.code.length,
    });
    return artifact;
  }
}
