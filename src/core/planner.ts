import { hashValue } from '../utils/hash.js';
import { actionKey, type Action, type ActionReason } from './actions.js';
import type { PartGraph } from './parts/graph.js';
import { describeInputChange } from './state/fingerprint.js';
import type { StepInputsResolver } from './state/inputs.js';
import type { StateStore } from './state/store.js';
import type { FingerprintInputs } from './state/types.js';
import {
  compareSteps,
  dependencyPrerequisiteStep,
  dependencyTargetFor,
  lifecycleSteps,
  maxStep,
  nextSteps,
  previousStep,
  stepsThrough,
  type Step,
  type StepOptions
} from './steps.js';

export interface PlanOptions {
  /** Run every step of the selected parts again, whatever their state. */
  force?: boolean;
}

export type StepStatusKind = 'never-run' | 'dirty' | 'valid';

export interface StepStatus {
  part: string;
  step: Step;
  status: StepStatusKind;
  reason?: ActionReason;
  detail?: string;
}

export interface Invalidation {
  part: string;
  step: Step;
  reason: ActionReason;
  cause: string;
}

export interface StepNode {
  part: string;
  step: Step;
}

/**
 * Works out which (part, step) pairs must run to bring the selected parts to a target step.
 *
 * Each pair is NeverRun (no record), Dirty (flagged, inputs changed, or something it builds on
 * is about to run) or Valid. Only non-valid pairs become actions, in an order where every step
 * comes after the same part's earlier steps and after the dependency steps it consumes.
 */
export class ActionPlanner {
  constructor(
    private readonly graph: PartGraph,
    private readonly store: StateStore,
    private readonly inputs: StepInputsResolver
  ) {}

  private get stepOptions(): StepOptions {
    return this.inputs.stepOptions;
  }

  async plan(target: Step, partNames?: readonly string[], opts: PlanOptions = {}): Promise<Action[]> {
    const selected = new Set(this.graph.select(partNames));
    const nodes = this.orderedNodes(this.targets(target, selected));

    const scheduled = new Set<string>();
    const actions: Action[] = [];
    for (const node of nodes) {
      const status = await this.evaluate(node, scheduled);
      const forced = opts.force === true && selected.has(node.part);
      if (status.status === 'never-run') {
        actions.push({ part: node.part, step: node.step, reason: 'never-run', type: 'run', detail: status.detail });
      } else if (forced) {
        actions.push({ part: node.part, step: node.step, reason: 'forced', type: 'rerun', detail: 'forced' });
      } else if (status.status === 'dirty') {
        actions.push({ part: node.part, step: node.step, reason: status.reason ?? 'properties-changed', type: 'run', detail: status.detail });
      } else {
        continue;
      }
      scheduled.add(actionKey(node));
    }
    return actions;
  }

  /** Why `step` of `part` would (or would not) run in a plan targeting it. */
  async explain(part: string, step: Step): Promise<StepStatus> {
    const nodes = this.orderedNodes(this.targets(step, new Set([part])));
    const scheduled = new Set<string>();
    for (const node of nodes) {
      const status = await this.evaluate(node, scheduled);
      if (node.part === part && node.step === step) return status;
      if (status.status !== 'valid') scheduled.add(actionKey(node));
    }
    return { part, step, status: 'valid' };
  }

  /**
   * Everything that becomes stale once `step` of `part` changes: the part's later steps and,
   * breadth-first, every dependent step consuming a stale one. The start node is not included.
   */
  invalidationClosure(part: string, step: Step): Invalidation[] {
    const out: Invalidation[] = [];
    const seen = new Set<string>([actionKey({ part, step })]);
    const queue: StepNode[] = [{ part, step }];

    const visit = (node: StepNode, reason: ActionReason, cause: string) => {
      const key = actionKey(node);
      if (seen.has(key)) return;
      seen.add(key);
      out.push({ ...node, reason, cause });
      queue.push(node);
    };

    while (queue.length > 0) {
      const node = queue.shift();
      if (!node) break;
      const cause = `${node.step} for part '${node.part}' changed`;
      for (const later of nextSteps(node.step, this.stepOptions)) {
        visit({ part: node.part, step: later }, 'downstream-invalidated', cause);
      }
      for (const dependent of this.graph.dependentsOf(node.part)) {
        for (const s of lifecycleSteps(this.stepOptions)) {
          if (dependencyPrerequisiteStep(s, this.stepOptions) === node.step) {
            visit({ part: dependent, step: s }, 'dependency-changed', cause);
          }
        }
      }
    }
    return out;
  }

  /**
   * Target step per part: the selected parts get `target`; each dependency gets the highest step
   * its dependents require of it. Walking dependents before dependencies settles every part once.
   */
  private targets(target: Step, selected: ReadonlySet<string>): Map<string, Step> {
    const targets = new Map<string, Step>();
    for (const name of selected) targets.set(name, target);

    for (const part of [...this.graph.topologicalOrder()].reverse()) {
      const name = part.definition.name;
      const t = targets.get(name);
      if (!t) continue;
      const depTarget = dependencyTargetFor(t, this.stepOptions);
      if (!depTarget) continue;
      for (const dep of this.graph.dependenciesOf(name)) {
        const current = targets.get(dep);
        targets.set(dep, current ? maxStep(current, depTarget) : depTarget);
      }
    }
    return targets;
  }

  /**
   * Linearise the (part, step) nodes with Kahn's algorithm. Among ready nodes, earlier steps go
   * first, then parts in topological order.
   */
  private orderedNodes(targets: ReadonlyMap<string, Step>): StepNode[] {
    const nodes = new Map<string, StepNode>();
    for (const part of this.graph.topologicalOrder()) {
      const name = part.definition.name;
      const t = targets.get(name);
      if (!t) continue;
      for (const step of stepsThrough(t, this.stepOptions)) nodes.set(actionKey({ part: name, step }), { part: name, step });
    }

    const waiting = new Map<string, Set<string>>();
    for (const [key, node] of nodes) {
      const preds = new Set<string>();
      for (const p of this.prerequisites(node)) {
        const pk = actionKey(p);
        if (nodes.has(pk)) preds.add(pk);
      }
      waiting.set(key, preds);
    }

    const order: StepNode[] = [];
    while (waiting.size > 0) {
      let best: StepNode | null = null;
      for (const [key, preds] of waiting) {
        if (preds.size > 0) continue;
        const node = nodes.get(key);
        if (node && (best === null || this.compareNodes(node, best) < 0)) best = node;
      }
      // Unreachable for a validated graph; guards against looping forever.
      if (best === null) throw new Error('unable to order planned steps');

      const bestKey = actionKey(best);
      order.push(best);
      waiting.delete(bestKey);
      for (const preds of waiting.values()) preds.delete(bestKey);
    }
    return order;
  }

  private compareNodes(a: StepNode, b: StepNode): number {
    return compareSteps(a.step, b.step) || this.graph.topologicalIndex(a.part) - this.graph.topologicalIndex(b.part);
  }

  /** Nodes that must be valid before `node` runs. */
  prerequisites(node: StepNode): StepNode[] {
    const out: StepNode[] = [];
    const prev = previousStep(node.step, this.stepOptions);
    if (prev) out.push({ part: node.part, step: prev });
    const prereq = dependencyPrerequisiteStep(node.step, this.stepOptions);
    if (prereq) for (const dep of this.graph.dependenciesOf(node.part)) out.push({ part: dep, step: prereq });
    return out;
  }

  private async evaluate(node: StepNode, scheduled: ReadonlySet<string>): Promise<StepStatus> {
    const { part, step } = node;
    const base = { part, step };
    const state = await this.store.get(part, step);
    if (!state) return { ...base, status: 'never-run', reason: 'never-run', detail: 'never run' };

    if (state.dirty) return { ...base, status: 'dirty', reason: state.dirty.reason, detail: state.dirty.cause };

    const prev = previousStep(step, this.stepOptions);
    if (prev && scheduled.has(actionKey({ part, step: prev }))) {
      return { ...base, status: 'dirty', reason: 'downstream-invalidated', detail: `${prev} for part '${part}' will run` };
    }

    const prereq = dependencyPrerequisiteStep(step, this.stepOptions);
    if (prereq) {
      for (const dep of this.graph.dependenciesOf(part)) {
        if (scheduled.has(actionKey({ part: dep, step: prereq }))) {
          return { ...base, status: 'dirty', reason: 'dependency-changed', detail: `${prereq} for part '${dep}' will run` };
        }
      }
    }

    const resolved = this.graph.part(part);
    const identity = step === 'pull' ? await this.inputs.sourceIdentity(resolved, state.inputs.source) : null;
    const current = await this.inputs.resolve(resolved, step, identity);
    if (current.fingerprint === state.fingerprint) return { ...base, status: 'valid' };

    const detail = describeInputChange(step, state.inputs, current.inputs) ?? 'inputs changed';
    return { ...base, status: 'dirty', reason: changeReason(state.inputs, current.inputs), detail };
  }
}

function changeReason(before: FingerprintInputs, after: FingerprintInputs): ActionReason {
  const own = (i: FingerprintInputs) => hashValue({ properties: i.properties, options: i.options, source: i.source });
  if (own(before) !== own(after)) return 'properties-changed';
  if (hashValue(before.dependencies) !== hashValue(after.dependencies)) return 'dependency-changed';
  return 'downstream-invalidated';
}
