import { getRenderer } from '../ui/renderer.js';
import { keyValue } from '../ui/format.js';
import { theme } from '../ui/theme.js';
import { openProject, type ProjectCommandOptions } from '../project.js';
import { failed, parseStep, type CommandResult } from './result.js';

export interface ExplainCommandOptions extends ProjectCommandOptions {
  part: string;
  step: string;
  json?: boolean;
}

/**
 * `partwright explain <part> <step>` tells whether the step would run and why.
 */
export async function runExplainCommand(opts: ExplainCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  try {
    const step = parseStep(opts.step, 'prime');
    const lcm = await openProject(opts);
    const status = await lcm.explain(opts.part, step);
    const state = await lcm.getState(opts.part, step);

    if (opts.json) {
      r.result({ ...status, fingerprint: state?.fingerprint ?? null, completedAt: state?.completedAt ?? null });
      return { ok: true };
    }
    r.heading(`${step} for part '${opts.part}'`);
    r.text(keyValue('Status', theme.status(status.status)(status.status)));
    if (status.reason) r.text(keyValue('Reason', status.reason));
    if (status.detail) r.text(keyValue('Detail', status.detail));
    if (state) {
      r.text(keyValue('Completed', state.completedAt));
      r.text(keyValue('Fingerprint', theme.dim(state.fingerprint.slice(0, 16))));
    }
    return { ok: true };
  } catch (err) {
    return failed(err);
  }
}
