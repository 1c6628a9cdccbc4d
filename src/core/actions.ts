import { z } from 'zod';

import type { Step } from './steps.js';

export const ActionReasonSchema = z.enum(['never-run', 'properties-changed', 'dependency-changed', 'downstream-invalidated', 'forced']);
export type ActionReason = z.infer<typeof ActionReasonSchema>;

/** `rerun` cleans the step's previous outputs before running it again. */
export type ActionType = 'run' | 'rerun';

export interface Action {
  part: string;
  step: Step;
  reason: ActionReason;
  type: ActionType;
  /** Human-readable explanation, e.g. "'make-parameters' property changed". */
  detail?: string;
}

export function actionKey(a: { part: string; step: Step }): string {
  return `${a.part}:${a.step}`;
}

export function describeAction(a: Action): string {
  const head = `${a.type === 'rerun' ? 'Rerun' : 'Run'} ${a.step} for part '${a.part}'`;
  return a.detail ? `${head} (${a.detail})` : `${head} (${a.reason})`;
}
