import type { PartGraph, ResolvedPart } from '../parts/graph.js';
import type { ProjectOptions } from '../parts/types.js';
import type { SourceContext } from '../plugins/types.js';
import { dependencyPrerequisiteStep, previousStep, type Step, type StepOptions } from '../steps.js';
import { fingerprintInputs } from './fingerprint.js';
import type { StateStore } from './store.js';
import type { FingerprintInputs } from './types.js';

/**
 * Gathers a step's fingerprint inputs from the recorded states of the steps it builds on.
 * Planning and execution both go through here, so a step just executed fingerprints the same
 * way the next plan will.
 */
export class StepInputsResolver {
  constructor(
    private readonly graph: PartGraph,
    private readonly store: StateStore,
    private readonly options: ProjectOptions,
    private readonly sourceContext: (part: string) => SourceContext
  ) {}

  get stepOptions(): StepOptions {
    return { overlay: this.options.overlay.enabled };
  }

  /** `"<part>:<step>"` of every dependency state `step` consumes. */
  consumedDependencies(part: string, step: Step): Array<{ part: string; step: Step }> {
    const prereq = dependencyPrerequisiteStep(step, this.stepOptions);
    if (!prereq) return [];
    return this.graph.dependenciesOf(part).map((d) => ({ part: d, step: prereq }));
  }

  /**
   * Current source identity of a part. Falls back to the recorded one when the handler cannot
   * tell before pulling.
   */
  async sourceIdentity(part: ResolvedPart, recorded: string | null): Promise<string | null> {
    if (!part.source) return null;
    const identity = await part.source.identify(part.definition, this.sourceContext(part.definition.name));
    return identity ?? recorded;
  }

  async resolve(part: ResolvedPart, step: Step, sourceIdentity: string | null): Promise<{ fingerprint: string; inputs: FingerprintInputs }> {
    const name = part.definition.name;
    const prev = previousStep(step, this.stepOptions);
    const previous = prev ? ((await this.store.get(name, prev))?.fingerprint ?? null) : null;

    const dependencies: Record<string, string> = {};
    for (const dep of this.consumedDependencies(name, step)) {
      const state = await this.store.get(dep.part, dep.step);
      dependencies[`${dep.part}:${dep.step}`] = state?.fingerprint ?? 'missing';
    }

    return fingerprintInputs(part, step, { options: this.options, sourceIdentity, previous, dependencies });
  }
}
