import { getRenderer } from '../ui/renderer.js';
import { openProject, type ProjectCommandOptions } from '../project.js';
import { failed, parseStep, type CommandResult } from './result.js';

export interface CleanCommandOptions extends ProjectCommandOptions {
  parts?: string[];
  step?: string;
}

/**
 * `partwright clean [parts...] [--step <step>]` undoes a step and every later one; the whole
 * lifecycle when no step is given.
 */
export async function runCleanCommand(opts: CleanCommandOptions): Promise<CommandResult> {
  const r = getRenderer();
  try {
    const step = parseStep(opts.step, 'pull');
    const lcm = await openProject(opts);
    const parts = opts.parts ?? [];
    if (parts.length === 0) {
      await lcm.clean(undefined, step);
    } else {
      // Validate every name before cleaning anything.
      for (const p of parts) lcm.graph.part(p);
      for (const p of parts) await lcm.clean(p, step);
    }
    const what = parts.length > 0 ? parts.map((p) => `'${p}'`).join(', ') : 'all parts';
    r.success(`Cleaned ${what} from ${step} onwards.`);
    return { ok: true };
  } catch (err) {
    return failed(err);
  }
}
