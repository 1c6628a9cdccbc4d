import { hashValue } from '../../utils/hash.js';
import type { ResolvedPart } from '../parts/graph.js';
import type { ProjectOptions } from '../parts/types.js';
import type { Step } from '../steps.js';
import type { FingerprintInputs } from './types.js';

export interface FingerprintContext {
  options: ProjectOptions;
  /** Identity of the part's source as it would be pulled now; used by the pull step only. */
  sourceIdentity: string | null;
  /** Fingerprint of the same part's previous step, `null` for the first step. */
  previous: string | null;
  /** `"<part>:<step>"` → fingerprint of each dependency state the step consumes. */
  dependencies: Record<string, string>;
}

/**
 * Deterministic fingerprint of everything that decides a step's output.
 *
 * Inputs are combined with sorted keys, so two calls with equal inputs hash identically
 * regardless of property order. Chaining through `previous` and dependency fingerprints makes
 * a change anywhere upstream show up downstream.
 */
export function fingerprintInputs(part: ResolvedPart, step: Step, ctx: FingerprintContext): { fingerprint: string; inputs: FingerprintInputs } {
  const inputs: FingerprintInputs = {
    properties: propertiesOfInterest(part, step),
    options: optionsOfInterest(ctx.options, step),
    source: step === 'pull' ? ctx.sourceIdentity : null,
    previous: ctx.previous,
    dependencies: { ...ctx.dependencies }
  };
  return { fingerprint: fingerprintOf(step, inputs), inputs };
}

export function fingerprintOf(step: Step, inputs: FingerprintInputs): string {
  return hashValue({ step, ...inputs });
}

/** Part properties a step's output depends on. */
export function propertiesOfInterest(part: ResolvedPart, step: Step): Record<string, unknown> {
  const d = part.definition;
  switch (step) {
    case 'pull':
      return {
        plugin: d.plugin,
        source: d.source,
        properties: pick(d.properties, part.plugin.pullProperties ?? []),
        overrides: d.overrides.pull
      };
    case 'overlay':
      return { after: d.after, overrides: d.overrides.overlay };
    case 'build':
      return {
        plugin: d.plugin,
        properties: d.properties,
        after: d.after,
        organize: d.organize,
        buildEnvironment: d.buildEnvironment,
        overrides: d.overrides.build
      };
    case 'stage':
      return { stage: d.stage, permissions: d.permissions, overrides: d.overrides.stage };
    case 'prime':
      return { prime: d.prime, permissions: d.permissions, overrides: d.overrides.prime };
  }
}

/** Project options a step's output depends on. Parallelism settings never take part. */
export function optionsOfInterest(options: ProjectOptions, step: Step): Record<string, unknown> {
  switch (step) {
    case 'pull':
      return { targetArch: options.targetArch };
    case 'overlay':
      return { overlay: options.overlay };
    case 'build':
      return { targetArch: options.targetArch, environment: options.environment };
    case 'stage':
      return { allowOverwrite: [...options.allowOverwrite].sort() };
    case 'prime':
      return {};
  }
}

/**
 * Name what differs between two sets of fingerprint inputs, most specific first. Returns `null`
 * when nothing does.
 */
export function describeInputChange(step: Step, before: FingerprintInputs, after: FingerprintInputs): string | null {
  const changedProps = changedKeys(before.properties, after.properties);
  if (changedProps.length > 0) {
    if (changedProps.includes('properties')) {
      const plugin = changedKeys(asRecord(before.properties.properties), asRecord(after.properties.properties));
      if (plugin.length > 0) return `${quoteList(plugin)} ${plural(plugin, 'property', 'properties')} changed`;
    }
    return `${quoteList(changedProps)} ${plural(changedProps, 'property', 'properties')} changed`;
  }

  const changedOpts = changedKeys(before.options, after.options);
  if (changedOpts.length > 0) return `${quoteList(changedOpts)} ${plural(changedOpts, 'option', 'options')} changed`;

  if (before.source !== after.source) return 'source changed';

  const deps = changedKeys(before.dependencies, after.dependencies);
  if (deps.length > 0) {
    const [part, depStep] = deps[0].split(':');
    return `${depStep ?? 'state'} for part '${part}' changed`;
  }

  if (before.previous !== after.previous) return `previous step of ${step} changed`;
  return null;
}

function changedKeys(a: Record<string, unknown>, b: Record<string, unknown>): string[] {
  const keys = [...new Set([...Object.keys(a), ...Object.keys(b)])].sort();
  return keys.filter((k) => hashValue(a[k]) !== hashValue(b[k]));
}

function pick(record: Readonly<Record<string, unknown>>, keys: readonly string[]): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const k of keys) if (k in record) out[k] = record[k];
  return out;
}

function asRecord(v: unknown): Record<string, unknown> {
  if (v && typeof v === 'object' && !Array.isArray(v)) return Object.fromEntries(Object.entries(v));
  return {};
}

function quoteList(keys: string[]): string {
  return keys.map((k) => `'${k}'`).join(', ');
}

function plural(items: unknown[], one: string, many: string): string {
  return items.length === 1 ? one : many;
}
