import { getRenderer } from '../ui/renderer.js';
import { openProject, type ProjectCommandOptions } from '../project.js';
import { failed, parseStep, type CommandResult } from './result.js';

export interface PlanCommandOptions extends ProjectCommandOptions {
  step?: string;
  parts?: string[];
  force?: boolean;
  json?: boolean;
}

/**
 * `partwright plan [step] [parts...]` prints the actions a run would execute.
 */
export async function runPlanCommand(opts: PlanCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  try {
    const target = parseStep(opts.step, 'prime');
    const lcm = await openProject(opts);
    const actions = await lcm.plan(target, nonEmpty(opts.parts), { force: opts.force });

    if (opts.json) {
      r.result(actions);
      return { ok: true };
    }
    r.heading(`Plan to ${target}`);
    r.actions(actions);
    return { ok: true };
  } catch (err) {
    return failed(err);
  }
}

export function nonEmpty(parts: string[] | undefined): string[] | undefined {
  return parts && parts.length > 0 ? parts : undefined;
}
