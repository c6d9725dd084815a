import { ValidationError } from '../lib/errors.js';
import { runOptionsSchema, type RunOptions, type RunOptionsInput } from '../schemas/run-options.schema.js';

export type { RunOptions, RunOptionsInput };

export const DEFAULT_RUN_OPTIONS: RunOptions = runOptionsSchema.parse({});

export function parseRunOptions(input: RunOptionsInput = {}): RunOptions {
  const result = runOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid plan run options', {
      issues: result.error.flatten().fieldErrors,
    });
  }
  return result.data;
}
