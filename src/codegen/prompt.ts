import { createHash } from 'node:crypto';

const SYSTEM_TEMPLATE = `You turn task descriptions into code that a machine runs unattended.
Tasks may be written in any language, informally, or paraphrased. Work out what is being asked,
then answer with a single program that does it.

APPLICATION TYPES:
- "script": a complete Python 3 program, run as \`python3 -c <code>\`
- "shell": a bash command or command sequence, run as \`bash -c <code>\`
Pick whichever suits the task better.

RULES:
- Read input files from and write output files to {{sandbox}} only
- Never read or write anything outside {{sandbox}}
- Never delete files
- Preserve the formatting and indentation of file contents you write
- Handle dates in any common format or locale the task implies
- If a package is missing, install it before using it
- Print the answer to stdout when the task asks for one
- Exit with a non-zero status if the task cannot be completed

OUTPUT FORMAT:
Reply with a JSON object and nothing else:
{"application_type": "script" or "shell", "code": "<the code>"}`;

const INJECTION_PATTERNS = [
  /ignore\s+(all\s+)?previous/i,
  /disregard\s+(all\s+)?instructions/i,
  /\boutput\s+format\b/i,
];

const MAX_APPEND_BYTES = 2048;

export class PromptTemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PromptTemplateError';
  }
}

export interface SystemPrompt {
  prompt: string;
  templateHash: string;
}

/**
 * Build the fixed system message sent with every generation request.
 * `append` is the operator's extra instructions; it is size-limited and may not
 * try to override the rules above it.
 */
export function buildSystemPrompt(sandboxRoot: string, append: string): SystemPrompt {
  if (Buffer.byteLength(append, 'utf-8') > MAX_APPEND_BYTES) {
    throw new PromptTemplateError(`TR_PROMPT_APPEND exceeds ${MAX_APPEND_BYTES} byte limit`);
  }

  for (const pattern of INJECTION_PATTERNS) {
    if (pattern.test(append)) {
      throw new PromptTemplateError(`TR_PROMPT_APPEND contains blocked pattern: ${pattern.source}`);
    }
  }

  const templateHash = createHash('sha256').update(SYSTEM_TEMPLATE).digest('hex').slice(0, 16);

  let prompt = SYSTEM_TEMPLATE.replaceAll('{{sandbox}}', sandboxRoot);
  if (append.trim()) {
    prompt += `\n\nADDITIONAL INSTRUCTIONS:\n${append.trim()}`;
  }

  return { prompt, templateHash: `sha256:${templateHash}` };
}

/** Task text for the next attempt: the original task plus the code that failed and its error. */
export function buildRetryTask(originalTask: string, failedCode: string, stderr: string): string {
  return (
    'The previous attempt failed. Please fix the code and try again.\n' +
    `Task: ${originalTask}\n` +
    `Generated Code: ${failedCode}\n` +
    `Error: ${stderr}`
  );
}
