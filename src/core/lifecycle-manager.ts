import { ZodError } from 'zod';

import { RunIdGenerator } from '../utils/id.js';
import { quietLogger, type Logger } from '../utils/logger.js';
import { FilesystemLayout } from '../workspace/filesystem.js';
import { initWorkspace, partPaths, workspacePaths, type WorkspacePaths } from '../workspace/layout.js';
import { MergeLock } from '../workspace/merge-lock.js';
import { OverlayManager } from '../workspace/overlay.js';
import { actionKey, describeAction, type Action } from './actions.js';
import {
  CallbackError,
  CancelledError,
  ConflictError,
  DependencyNotReadyError,
  PartDefinitionError,
  PartsError,
  StepExecutionError,
  describeCause
} from './errors.js';
import { PartHandler } from './executor/part-handler.js';
import { HookRegistry, type RunInfo } from './hooks.js';
import { ScriptError, ShellScriptRunner, type ScriptRunner } from './executor/step-runner.js';
import { JournalReader } from './journal/reader.js';
import { JournalWriter } from './journal/writer.js';
import { buildPartGraph, type PartGraph } from './parts/graph.js';
import {
  PartDefinitionSchema,
  ProjectOptionsSchema,
  type PartDefinition,
  type PartDefinitionInput,
  type ProjectOptions,
  type ProjectOptionsInput
} from './parts/types.js';
import { ActionPlanner, type Invalidation, type PlanOptions, type StepStatus } from './planner.js';
import { PluginRegistry } from './plugins/registry.js';
import { SourceRegistry } from './sources/registry.js';
import { StepInputsResolver } from './state/inputs.js';
import { StateStore } from './state/store.js';
import type { StepState } from './state/types.js';
import { lifecycleSteps, stepIndex, type Step, type StepOptions } from './steps.js';

export interface LifecycleManagerOptions {
  parts: readonly PartDefinitionInput[];
  options: ProjectOptionsInput;
  plugins?: PluginRegistry;
  sources?: SourceRegistry;
  logger?: Logger;
  runner?: ScriptRunner;
  /** Callbacks run around execution; a fresh registry when omitted. */
  hooks?: HookRegistry;
}

export type ActionStatus = 'succeeded' | 'failed' | 'skipped' | 'cancelled';

export interface ActionResult {
  action: Action;
  status: ActionStatus;
  durationMs?: number;
  error?: PartsError;
}

export interface RunOutcome {
  runId: string;
  ok: boolean;
  cancelled: boolean;
  results: ActionResult[];
  /** The failure that stopped the run. */
  error?: PartsError;
}

export type RunEvent =
  | { type: 'action_started'; action: Action }
  | { type: 'action_completed'; action: Action; durationMs: number }
  | { type: 'action_failed'; action: Action; durationMs: number; error: PartsError };

export interface ExecuteOptions {
  signal?: AbortSignal;
  onEvent?: (event: RunEvent) => void;
}

/**
 * Entry point of the engine: validates parts up front, plans actions and executes them.
 *
 * Nothing touches the work directory until `execute` or `clean` is called, so a project with
 * invalid parts fails before any filesystem change.
 */
export class LifecycleManager {
  readonly ws: WorkspacePaths;
  private readonly store: StateStore;
  private readonly planner: ActionPlanner;
  private readonly fs: FilesystemLayout;
  private readonly handler: PartHandler;
  private readonly inputs: StepInputsResolver;
  private journal: JournalWriter | null = null;
  private runIds: RunIdGenerator | null = null;

  private constructor(
    readonly graph: PartGraph,
    readonly options: ProjectOptions,
    private readonly logger: Logger,
    runner: ScriptRunner,
    readonly hooks: HookRegistry
  ) {
    this.ws = workspacePaths(options.workDir);
    this.store = new StateStore(this.ws, logger);
    this.fs = new FilesystemLayout(this.ws, options, logger, new MergeLock(), (name) =>
      graph.has(name) ? graph.part(name).definition.permissions : []
    );
    this.handler = new PartHandler({
      ws: this.ws,
      options,
      graph,
      fs: this.fs,
      overlay: new OverlayManager(options.overlay.base, options.projectDir, logger),
      state: this.store,
      runner,
      logger
    });
    this.inputs = new StepInputsResolver(graph, this.store, options, (name) => this.handler.sourceContext(name));
    this.planner = new ActionPlanner(graph, this.store, this.inputs);
  }

  static create(opts: LifecycleManagerOptions): LifecycleManager {
    const logger = opts.logger ?? quietLogger();
    const parts = parseParts(opts.parts);
    const options = parseOptions(opts.options);
    const graph = buildPartGraph(parts, {
      plugins: opts.plugins ?? PluginRegistry.withBuiltins(),
      sources: opts.sources ?? SourceRegistry.withBuiltins()
    });
    return new LifecycleManager(graph, options, logger, opts.runner ?? new ShellScriptRunner(logger), opts.hooks ?? new HookRegistry());
  }

  get stepOptions(): StepOptions {
    return this.inputs.stepOptions;
  }

  /** Actions bringing `parts` (all parts when omitted) to `target`, dependencies included. */
  async plan(target: Step, parts?: readonly string[], opts: PlanOptions = {}): Promise<Action[]> {
    const actions = await this.planner.plan(target, parts, opts);
    this.logger.debug(`Planned ${actions.length} action(s) for ${target}`, { parts: parts ?? 'all' });
    return actions;
  }

  async explain(part: string, step: Step): Promise<StepStatus> {
    this.graph.part(part);
    return await this.planner.explain(part, step);
  }

  async getState(part: string, step: Step): Promise<StepState | null> {
    this.graph.part(part);
    return await this.store.get(part, step);
  }

  /**
   * Flag a recorded step as dirty together with everything built on it. Ownership records stay,
   * so the reruns can take back what the old outputs placed in the shared areas.
   */
  async markDirty(part: string, step: Step): Promise<Invalidation[]> {
    this.graph.part(part);
    const marked: Invalidation[] = [];
    const start: Invalidation = { part, step, reason: 'forced', cause: `${step} for part '${part}' was marked dirty` };
    for (const inv of [start, ...this.planner.invalidationClosure(part, step)]) {
      if (await this.store.markDirty(inv.part, inv.step, { reason: inv.reason, cause: inv.cause })) marked.push(inv);
    }
    return marked;
  }

  /**
   * Undo `step` and every later step of `part` (of every part when omitted), latest step first.
   * Without `step` the whole lifecycle is cleaned.
   */
  async clean(part?: string, step?: Step): Promise<void> {
    const names = part ? [this.graph.part(part).definition.name] : this.graph.names();
    const from = step ?? 'pull';
    const steps = lifecycleSteps(this.stepOptions)
      .filter((s) => stepIndex(s) >= stepIndex(from))
      .reverse();

    await initWorkspace(this.ws.workDir);
    const journal = await this.openJournal();
    // Dependents before their dependencies.
    const ordered = this.graph
      .topologicalOrder()
      .map((p) => p.definition.name)
      .filter((n) => names.includes(n))
      .reverse();

    for (const s of steps) {
      for (const name of ordered) {
        await this.fs.clean(name, s);
        await this.store.invalidate(name, s);
        await journal.append({ type: 'step_cleaned', data: { part: name, step: s } });
        this.logger.debug(`Cleaned ${s} for part '${name}'`);
      }
    }
  }

  /**
   * Execute `actions` in order, recording state after each success. The first failure stops the
   * run; actions already completed stay recorded. With `concurrency` above 1, actions whose
   * prerequisites have completed may run side by side.
   *
   * Prologue callbacks run before the first action; a failing prologue starts none of them.
   * Once a prologue has succeeded, epilogue callbacks run after the last action whatever the outcome.
   */
  async execute(actions: readonly Action[], opts: ExecuteOptions = {}): Promise<RunOutcome> {
    await initWorkspace(this.ws.workDir);
    const journal = await this.openJournal();
    const runId = (await this.openRunIds()).next();
    const emit = (e: RunEvent) => opts.onEvent?.(e);

    const results: ActionResult[] = actions.map((action) => ({ action, status: 'skipped' }));
    const done = new Set<number>();
    const running = new Map<number, Promise<void>>();
    let failure: PartsError | undefined;
    let cancelled = false;

    await journal.append({ type: 'run_started', runId, data: { actions: actions.length } });

    const run: RunInfo = { runId, projectDir: this.options.projectDir, workDir: this.ws.workDir, parts: this.partsOf(actions) };
    let prologueOk = true;
    try {
      await this.hooks.runPrologue(run);
    } catch (err) {
      prologueOk = false;
      failure = new CallbackError('prologue', err);
    }

    const runOne = async (i: number) => {
      const action = actions[i];
      const started = Date.now();
      const ref = { part: action.part, step: action.step, reason: action.reason, type: action.type };
      emit({ type: 'action_started', action });
      await journal.append({ type: 'action_started', runId, data: ref });
      this.logger.info(describeAction(action));
      try {
        const fingerprint = await this.runAction(action, runId, opts.signal);
        const durationMs = Date.now() - started;
        results[i] = { action, status: 'succeeded', durationMs };
        await journal.append({ type: 'action_completed', runId, data: { ...ref, durationMs, fingerprint } });
        emit({ type: 'action_completed', action, durationMs });
      } catch (err) {
        const durationMs = Date.now() - started;
        const error = this.wrapError(action, err);
        if (error instanceof CancelledError) {
          cancelled = true;
          results[i] = { action, status: 'cancelled', durationMs, error };
        } else {
          failure ??= error;
          results[i] = { action, status: 'failed', durationMs, error };
        }
        await journal.append({ type: 'action_failed', runId, data: { ...ref, durationMs, error: error.brief } });
        emit({ type: 'action_failed', action, durationMs, error });
      } finally {
        done.add(i);
      }
    };

    const limit = Math.max(1, this.options.concurrency);
    const pending = new Set<number>(actions.map((_, i) => i));
    while (pending.size > 0 || running.size > 0) {
      if (opts.signal?.aborted) cancelled = true;
      const stopping = failure !== undefined || cancelled;

      if (!stopping) {
        for (const i of [...pending].sort((a, b) => a - b)) {
          if (running.size >= limit) break;
          if (!this.isReady(actions, i, done)) {
            // Sequential runs never start an action ahead of one that is still waiting.
            if (limit === 1) break;
            continue;
          }
          pending.delete(i);
          running.set(
            i,
            runOne(i).finally(() => running.delete(i))
          );
        }
      }

      if (running.size === 0) break;
      await Promise.race(running.values());
    }

    if (cancelled) {
      for (const i of pending) results[i] = { action: actions[i], status: 'cancelled' };
    }

    if (prologueOk) {
      try {
        await this.hooks.runEpilogue(run);
      } catch (err) {
        failure ??= new CallbackError('epilogue', err);
      }
    }

    const completed = results.filter((r) => r.status === 'succeeded').length;
    const failed = results.filter((r) => r.status === 'failed').length;
    if (cancelled) {
      await journal.append({ type: 'run_cancelled', runId, data: { completed, failed } });
      this.logger.warn('Run cancelled', { completed });
      return { runId, ok: false, cancelled: true, results, error: failure ?? new CancelledError() };
    }
    if (failure) {
      await journal.append({ type: 'run_failed', runId, data: { completed, failed, error: failure.brief } });
      this.logger.error(failure.brief, { details: failure.details });
      return { runId, ok: false, cancelled: false, results, error: failure };
    }
    await journal.append({ type: 'run_completed', runId, data: { completed, failed } });
    return { runId, ok: true, cancelled: false, results };
  }

  /**
   * An action may start once every earlier action of the same part, and every earlier action
   * producing a state it consumes, has finished.
   */
  private isReady(actions: readonly Action[], i: number, done: ReadonlySet<number>): boolean {
    const action = actions[i];
    const blockers = new Set(this.planner.prerequisites(action).map(actionKey));
    for (let j = 0; j < i; j++) {
      if (done.has(j)) continue;
      const other = actions[j];
      if (other.part === action.part || blockers.has(actionKey(other))) return false;
    }
    return true;
  }

  /** Names of the parts `actions` touch, in topological order. */
  private partsOf(actions: readonly Action[]): string[] {
    const touched = new Set(actions.map((a) => a.part));
    return this.graph
      .topologicalOrder()
      .map((p) => p.definition.name)
      .filter((n) => touched.has(n));
  }

  private async runAction(action: Action, runId: string, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) throw new CancelledError();
    const part = this.graph.part(action.part);
    await this.checkPrerequisites(action);

    // Until the step succeeds again its old record must not read as valid.
    const existing = await this.store.get(action.part, action.step);
    if (existing) {
      await this.store.markDirty(action.part, action.step, {
        reason: action.reason,
        cause: action.detail ?? `${action.step} for part '${action.part}' is being rerun`
      });
    }
    if (action.type === 'rerun') {
      for (const inv of this.planner.invalidationClosure(action.part, action.step)) {
        await this.store.markDirty(inv.part, inv.step, { reason: inv.reason, cause: inv.cause });
      }
    }

    const info = {
      runId,
      part: action.part,
      step: action.step,
      dirs: partPaths(this.ws, action.part),
      stageDir: this.ws.stageDir,
      primeDir: this.ws.primeDir,
      projectDir: this.options.projectDir
    };
    await this.hooks.runPreStep(info);
    const outcome = await this.handler.run(part, action.step, signal);

    const identity = action.step === 'pull' ? outcome.sourceIdentity : null;
    const { fingerprint, inputs } = await this.inputs.resolve(part, action.step, identity);
    await this.store.put({
      version: 1,
      part: action.part,
      step: action.step,
      fingerprint,
      inputs,
      files: outcome.files,
      directories: outcome.directories,
      completedAt: new Date().toISOString()
    });
    await this.hooks.runPostStep(info);
    return fingerprint;
  }

  private async checkPrerequisites(action: Action): Promise<void> {
    for (const pre of this.planner.prerequisites(action)) {
      const state = await this.store.get(pre.part, pre.step);
      if (state && !state.dirty) continue;
      if (pre.part === action.part) {
        throw new StepExecutionError(action.part, action.step, undefined, `Step ${pre.step} of part '${pre.part}' has not completed.`);
      }
      throw new DependencyNotReadyError(action.part, action.step, pre.part, pre.step);
    }
  }

  private wrapError(action: Action, err: unknown): PartsError {
    if (err instanceof StepExecutionError || err instanceof ConflictError || err instanceof CancelledError) return err;
    if (err instanceof ScriptError) {
      return new StepExecutionError(action.part, action.step, err, [err.message, err.output].filter(Boolean).join('\n'));
    }
    if (err instanceof PartsError) return new StepExecutionError(action.part, action.step, err, err.toString());
    return new StepExecutionError(action.part, action.step, err, describeCause(err));
  }

  private async openJournal(): Promise<JournalWriter> {
    this.journal ??= await JournalWriter.open(this.ws.journalPath);
    return this.journal;
  }

  private async openRunIds(): Promise<RunIdGenerator> {
    this.runIds ??= new RunIdGenerator(await new JournalReader(this.ws.journalPath).lastRunId());
    return this.runIds;
  }
}

function parseParts(parts: readonly PartDefinitionInput[]): PartDefinition[] {
  const problems: string[] = [];
  const parsed: PartDefinition[] = [];
  parts.forEach((p, i) => {
    const res = PartDefinitionSchema.safeParse(p);
    if (res.success) {
      parsed.push(res.data);
      return;
    }
    const label = typeof p.name === 'string' ? `'${p.name}'` : `#${i + 1}`;
    for (const issue of res.error.issues) problems.push(`part ${label}: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
  });
  if (problems.length > 0) throw new PartDefinitionError(problems);
  return parsed;
}

function parseOptions(input: ProjectOptionsInput): ProjectOptions {
  try {
    return ProjectOptionsSchema.parse(input);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new PartDefinitionError(
        err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
        'project options'
      );
    }
    throw err;
  }
}
