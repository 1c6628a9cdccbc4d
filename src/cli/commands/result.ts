import { CancelledError, PartsError, describeCause } from '../../core/errors.js';
import { isStep, type Step } from '../../core/steps.js';

export interface CommandResult {
  ok: boolean;
  cancelled?: boolean;
  error?: unknown;
}

export function failed(error: unknown): CommandResult {
  return { ok: false, cancelled: error instanceof CancelledError, error };
}

/** Title, details and tip for `Renderer.error`. */
export function describeFailure(error: unknown): { title: string; details: string; tip?: string } {
  if (error instanceof PartsError) return { title: error.brief, details: error.details ?? '', tip: error.resolution };
  return { title: 'Unexpected error', details: describeCause(error) ?? 'unknown error', tip: 'Try running with --verbose for more details.' };
}

export class UsageError extends PartsError {}

export function parseStep(value: string | undefined, fallback: Step): Step {
  if (value === undefined) return fallback;
  if (!isStep(value)) {
    throw new UsageError({ brief: `Unknown step '${value}'.`, resolution: 'Use one of: pull, overlay, build, stage, prime.' });
  }
  return value;
}
