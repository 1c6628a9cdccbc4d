import { z } from 'zod';

/**
 * Lifecycle steps, in execution order.
 *
 * `pull` retrieves a part's sources, `overlay` (layered builds only) records the part's changes on
 * top of the base filesystem, `build` runs the build system and installs into the part's install
 * directory, `stage` merges install trees from all parts into the shared stage area, and `prime`
 * copies the final selection into the prime area.
 */
export const STEPS = ['pull', 'overlay', 'build', 'stage', 'prime'] as const;

export const StepSchema = z.enum(STEPS);
export type Step = z.infer<typeof StepSchema>;

export interface StepOptions {
  /** Whether layered builds (the `overlay` step) are enabled. */
  overlay: boolean;
}

export function stepIndex(step: Step): number {
  return STEPS.indexOf(step);
}

export function compareSteps(a: Step, b: Step): number {
  return stepIndex(a) - stepIndex(b);
}

export function isStep(v: unknown): v is Step {
  return StepSchema.safeParse(v).success;
}

export function lifecycleSteps(opts: StepOptions): Step[] {
  return STEPS.filter((s) => s !== 'overlay' || opts.overlay);
}

export function previousSteps(step: Step, opts: StepOptions): Step[] {
  return lifecycleSteps(opts).filter((s) => compareSteps(s, step) < 0);
}

export function nextSteps(step: Step, opts: StepOptions): Step[] {
  return lifecycleSteps(opts).filter((s) => compareSteps(s, step) > 0);
}

/** Steps up to and including `step`. */
export function stepsThrough(step: Step, opts: StepOptions): Step[] {
  return lifecycleSteps(opts).filter((s) => compareSteps(s, step) <= 0);
}

export function previousStep(step: Step, opts: StepOptions): Step | null {
  const prev = previousSteps(step, opts);
  return prev.length > 0 ? prev[prev.length - 1] : null;
}

/**
 * The step every dependency of a part must have completed before the part runs `step`.
 *
 * | step    | dependencies must reach |
 * |---------|-------------------------|
 * | pull    | nothing                 |
 * | overlay | overlay                 |
 * | build   | stage                   |
 * | stage   | stage                   |
 * | prime   | prime                   |
 */
export function dependencyPrerequisiteStep(step: Step, opts: StepOptions): Step | null {
  switch (step) {
    case 'pull':
      return null;
    case 'overlay':
      return opts.overlay ? 'overlay' : null;
    case 'build':
    case 'stage':
      return 'stage';
    case 'prime':
      return 'prime';
  }
}

/** Highest prerequisite step any step up to `target` demands of dependencies. */
export function dependencyTargetFor(target: Step, opts: StepOptions): Step | null {
  let best: Step | null = null;
  for (const s of stepsThrough(target, opts)) {
    const prereq = dependencyPrerequisiteStep(s, opts);
    if (prereq && (best === null || compareSteps(prereq, best) > 0)) best = prereq;
  }
  return best;
}

export function maxStep(a: Step, b: Step): Step {
  return compareSteps(a, b) >= 0 ? a : b;
}
