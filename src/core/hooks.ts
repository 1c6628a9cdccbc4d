import type { PartPaths } from '../workspace/layout.js';
import { CallbackRegistrationError } from './errors.js';
import type { Step } from './steps.js';

/** What prologue and epilogue callbacks learn about a run. */
export interface RunInfo {
  readonly runId: string;
  readonly projectDir: string;
  readonly workDir: string;
  /** Parts the run's actions touch, in topological order. */
  readonly parts: readonly string[];
}

/** What pre-step and post-step callbacks learn about the step at hand. */
export interface StepInfo {
  readonly runId: string;
  readonly part: string;
  readonly step: Step;
  readonly dirs: Readonly<PartPaths>;
  readonly stageDir: string;
  readonly primeDir: string;
  readonly projectDir: string;
}

export type RunCallback = (info: RunInfo) => void | Promise<void>;
export type StepCallback = (info: StepInfo) => void | Promise<void>;

export type HookPoint = 'prologue' | 'epilogue' | 'pre-step' | 'post-step';

interface StepHook {
  fn: StepCallback;
  point: 'pre-step' | 'post-step';
  /** `null` runs the callback around every step. */
  steps: readonly Step[] | null;
}

/**
 * Callbacks an embedding application attaches to execution. Prologues run before the first action
 * of `execute`, epilogues after the last one (also when the run fails). Pre-step callbacks run
 * before a step's work, post-step callbacks once its state is recorded. A function may be
 * registered once per point.
 */
export class HookRegistry {
  private readonly prologues: RunCallback[] = [];
  private readonly epilogues: RunCallback[] = [];
  private readonly stepHooks: StepHook[] = [];

  registerPrologue(fn: RunCallback): this {
    if (this.prologues.includes(fn)) throw new CallbackRegistrationError('prologue', fn.name);
    this.prologues.push(fn);
    return this;
  }

  registerEpilogue(fn: RunCallback): this {
    if (this.epilogues.includes(fn)) throw new CallbackRegistrationError('epilogue', fn.name);
    this.epilogues.push(fn);
    return this;
  }

  registerPreStep(fn: StepCallback, opts: { steps?: readonly Step[] } = {}): this {
    return this.registerStep(fn, 'pre-step', opts.steps);
  }

  registerPostStep(fn: StepCallback, opts: { steps?: readonly Step[] } = {}): this {
    return this.registerStep(fn, 'post-step', opts.steps);
  }

  /** Drop every registered callback. */
  clear(): void {
    this.prologues.length = 0;
    this.epilogues.length = 0;
    this.stepHooks.length = 0;
  }

  async runPrologue(info: RunInfo): Promise<void> {
    for (const fn of this.prologues) await fn(info);
  }

  async runEpilogue(info: RunInfo): Promise<void> {
    for (const fn of this.epilogues) await fn(info);
  }

  async runPreStep(info: StepInfo): Promise<void> {
    await this.runStep('pre-step', info);
  }

  async runPostStep(info: StepInfo): Promise<void> {
    await this.runStep('post-step', info);
  }

  private registerStep(fn: StepCallback, point: StepHook['point'], steps: readonly Step[] | undefined): this {
    if (this.stepHooks.some((h) => h.fn === fn && h.point === point)) throw new CallbackRegistrationError(point, fn.name);
    this.stepHooks.push({ fn, point, steps: steps && steps.length > 0 ? [...steps] : null });
    return this;
  }

  private async runStep(point: StepHook['point'], info: StepInfo): Promise<void> {
    for (const hook of this.stepHooks) {
      if (hook.point !== point) continue;
      if (hook.steps && !hook.steps.includes(info.step)) continue;
      await hook.fn(info);
    }
  }
}
