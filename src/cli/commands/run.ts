import type { RunOutcome } from '../../core/lifecycle-manager.js';
import { installCliCancellation } from '../cancel.js';
import { formatMs } from '../ui/format.js';
import { getRenderer } from '../ui/renderer.js';
import { openProject, type ProjectCommandOptions } from '../project.js';
import { nonEmpty } from './plan.js';
import { failed, parseStep, type CommandResult } from './result.js';

export interface RunCommandOptions extends ProjectCommandOptions {
  step?: string;
  parts?: string[];
  force?: boolean;
  json?: boolean;
  /** Overrides the SIGINT/SIGTERM handling (tests). */
  signal?: AbortSignal;
}

/**
 * `partwright run [step] [parts...]` plans and executes. Ctrl+C stops the running step and
 * starts nothing further; a second Ctrl+C exits at once.
 */
export async function runRunCommand(opts: RunCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  const cancellation = opts.signal ? null : installCliCancellation({ onCancel: () => r.warn('Cancelling… (press Ctrl+C again to exit now)') });
  const signal = opts.signal ?? cancellation?.signal;
  try {
    const target = parseStep(opts.step, 'prime');
    const lcm = await openProject(opts);
    const actions = await lcm.plan(target, nonEmpty(opts.parts), { force: opts.force });
    if (actions.length === 0) {
      if (opts.json) r.result(summary({ runId: null, ok: true, cancelled: false, results: [] }));
      else r.success(`Everything is up to date for ${target}.`);
      return { ok: true };
    }

    const started = Date.now();
    const outcome = await lcm.execute(actions, {
      signal,
      onEvent: (e) => {
        if (e.type === 'action_started') r.actionStarted(e.action);
        else if (e.type === 'action_completed') r.actionCompleted(e.action, e.durationMs);
        else r.actionFailed(e.action, e.durationMs, e.error.brief);
      }
    });

    if (opts.json) r.result(summary(outcome));
    if (!outcome.ok) return failed(outcome.error);
    if (!opts.json) r.success(`Ran ${outcome.results.length} action(s) in ${formatMs(Date.now() - started)} (${outcome.runId}).`);
    return { ok: true };
  } catch (err) {
    return failed(err);
  } finally {
    cancellation?.dispose();
  }
}

function summary(outcome: Pick<RunOutcome, 'ok' | 'cancelled' | 'results'> & { runId: string | null }) {
  return {
    runId: outcome.runId,
    ok: outcome.ok,
    cancelled: outcome.cancelled,
    results: outcome.results.map((res) => ({
      part: res.action.part,
      step: res.action.step,
      reason: res.action.reason,
      status: res.status,
      durationMs: res.durationMs,
      error: res.error?.brief
    }))
  };
}
