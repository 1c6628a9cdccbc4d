import type { StepStatus } from '../../core/planner.js';
import { lifecycleSteps } from '../../core/steps.js';
import { getRenderer } from '../ui/renderer.js';
import { openProject, type ProjectCommandOptions } from '../project.js';
import { nonEmpty } from './plan.js';
import { failed, type CommandResult } from './result.js';

export interface StatusCommandOptions extends ProjectCommandOptions {
  parts?: string[];
  json?: boolean;
}

/**
 * `partwright status [parts...]` shows every step of each part as never-run, dirty or valid.
 */
export async function runStatusCommand(opts: StatusCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  try {
    const lcm = await openProject(opts);
    const names = lcm.graph.select(nonEmpty(opts.parts));
    const statuses: StepStatus[] = [];
    for (const name of names) {
      for (const step of lifecycleSteps(lcm.stepOptions)) statuses.push(await lcm.explain(name, step));
    }

    if (opts.json) {
      r.result(statuses);
      return { ok: true };
    }
    r.heading(`Parts in ${lcm.ws.workDir}`);
    r.statuses(statuses);
    return { ok: true };
  } catch (err) {
    return failed(err);
  }
}
