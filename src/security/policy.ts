export type TaskValidationResult =
  | { valid: true; task: string }
  | { valid: false; errors: string[] };

/** Validate the `task` query value of a run request. */
export function validateTask(input: unknown, maxBytes: number): TaskValidationResult {
  if (typeof input !== 'string' || !input.trim()) {
    return { valid: false, errors: ['task is required'] };
  }
  if (Buffer.byteLength(input, 'utf-8') > maxBytes) {
    return { valid: false, errors: [`task exceeds ${maxBytes} byte limit`] };
  }
  return { valid: true, task: input };
}
