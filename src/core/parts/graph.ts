import {
  CycleError,
  DuplicatePartError,
  PluginPropertyError,
  PluginResolutionError,
  PropertyValidationError,
  UnknownDependencyError,
  UnknownPartError
} from '../errors.js';
import type { PluginRegistry } from '../plugins/registry.js';
import type { Plugin, SourceHandler } from '../plugins/types.js';
import type { SourceRegistry } from '../sources/registry.js';
import type { PartDefinition } from './types.js';

/** A part with its plugin and source handler resolved once, at graph construction. */
export interface ResolvedPart {
  readonly definition: Readonly<PartDefinition>;
  readonly plugin: Plugin;
  /** `null` for parts that declare no source. */
  readonly source: SourceHandler | null;
}

export interface BuildGraphOptions {
  plugins: PluginRegistry;
  sources: SourceRegistry;
}

/**
 * Validate part definitions and build the dependency graph.
 *
 * Checks run in a fixed order, so the first class of problem found is the one reported:
 * duplicates, unknown dependencies, cycles, unknown plugins, unknown source types, then plugin
 * properties (every offending part at once).
 */
export function buildPartGraph(parts: readonly PartDefinition[], opts: BuildGraphOptions): PartGraph {
  const seen = new Set<string>();
  for (const p of parts) {
    if (seen.has(p.name)) throw new DuplicatePartError(p.name);
    seen.add(p.name);
  }

  for (const p of parts) {
    for (const dep of p.after) {
      if (!seen.has(dep)) throw new UnknownDependencyError(p.name, dep);
    }
  }

  const order = topologicalSort(parts);

  const resolved: ResolvedPart[] = [];
  for (const p of parts) {
    const plugin = opts.plugins.resolve(p.plugin);
    if (!plugin) throw new PluginResolutionError(p.name, p.plugin);
    let source: SourceHandler | null = null;
    if (p.source) {
      source = opts.sources.resolve(p.source.type) ?? null;
      if (!source) throw new PluginResolutionError(p.name, p.source.type, 'source type');
    }
    resolved.push({ definition: deepFreeze(structuredClone(p)), plugin, source });
  }

  const problems: PluginPropertyError[] = [];
  for (const r of resolved) {
    try {
      r.plugin.validateProperties(r.definition);
    } catch (err) {
      if (err instanceof PluginPropertyError) problems.push(err);
      else problems.push(new PluginPropertyError(r.definition.name, [err instanceof Error ? err.message : String(err)]));
    }
  }
  if (problems.length > 0) throw new PropertyValidationError(problems);

  return new PartGraph(resolved, order);
}

export class PartGraph {
  private readonly byName = new Map<string, ResolvedPart>();
  private readonly dependents = new Map<string, string[]>();
  private readonly topoIndex = new Map<string, number>();

  constructor(
    private readonly parts: readonly ResolvedPart[],
    private readonly order: readonly string[]
  ) {
    for (const p of parts) {
      this.byName.set(p.definition.name, p);
      this.dependents.set(p.definition.name, []);
    }
    for (const p of parts) {
      for (const dep of uniq(p.definition.after)) this.dependents.get(dep)?.push(p.definition.name);
    }
    order.forEach((name, i) => this.topoIndex.set(name, i));
  }

  /** Part names in declaration order. */
  names(): string[] {
    return this.parts.map((p) => p.definition.name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  part(name: string): ResolvedPart {
    const p = this.byName.get(name);
    if (!p) throw new UnknownPartError(name);
    return p;
  }

  /** Dependencies first; ties broken by declaration order. Identical input gives identical order. */
  topologicalOrder(): ResolvedPart[] {
    return this.order.map((name) => this.part(name));
  }

  topologicalIndex(name: string): number {
    const i = this.topoIndex.get(name);
    if (i === undefined) throw new UnknownPartError(name);
    return i;
  }

  dependenciesOf(name: string, opts: { transitive?: boolean } = {}): string[] {
    const direct = uniq(this.part(name).definition.after);
    if (!opts.transitive) return direct;
    return this.closure(direct, (n) => this.part(n).definition.after);
  }

  dependentsOf(name: string, opts: { transitive?: boolean } = {}): string[] {
    this.part(name);
    const direct = this.dependents.get(name) ?? [];
    if (!opts.transitive) return [...direct];
    return this.closure(direct, (n) => this.dependents.get(n) ?? []);
  }

  /**
   * Validate a selection of part names. `undefined` or an empty list selects every part.
   * The result follows topological order.
   */
  select(names?: readonly string[]): string[] {
    if (!names || names.length === 0) return [...this.order];
    for (const n of names) this.part(n);
    const wanted = new Set(names);
    return this.order.filter((n) => wanted.has(n));
  }

  /** Breadth-first closure over `next`, returned in topological order. */
  private closure(start: readonly string[], next: (name: string) => readonly string[]): string[] {
    const visited = new Set<string>();
    const queue = [...start];
    while (queue.length > 0) {
      const n = queue.shift();
      if (n === undefined || visited.has(n)) continue;
      visited.add(n);
      for (const m of next(n)) if (!visited.has(m)) queue.push(m);
    }
    return this.order.filter((n) => visited.has(n));
  }
}

/**
 * Kahn's algorithm over `after` edges. Among ready parts the earliest declared goes first.
 * Parts left over sit on, or behind, a cycle; one actual cycle is extracted for the error.
 */
function topologicalSort(parts: readonly PartDefinition[]): string[] {
  const declIndex = new Map(parts.map((p, i) => [p.name, i]));
  const remaining = new Map(parts.map((p) => [p.name, new Set(p.after)]));
  const order: string[] = [];

  while (remaining.size > 0) {
    let next: string | null = null;
    for (const [name, deps] of remaining) {
      if (deps.size > 0) continue;
      if (next === null || (declIndex.get(name) ?? 0) < (declIndex.get(next) ?? 0)) next = name;
    }
    if (next === null) throw new CycleError(findCycle(remaining, declIndex));

    order.push(next);
    remaining.delete(next);
    for (const deps of remaining.values()) deps.delete(next);
  }

  return order;
}

function findCycle(remaining: Map<string, Set<string>>, declIndex: Map<string, number>): string[] {
  const [start] = remaining.keys();
  const path: string[] = [];
  const position = new Map<string, number>();
  let current: string | undefined = start;

  // Every leftover part still waits on another leftover part, so this walk must loop.
  while (current !== undefined && !position.has(current)) {
    position.set(current, path.length);
    path.push(current);
    const deps: Set<string> | undefined = remaining.get(current);
    current = deps ? [...deps].find((d) => remaining.has(d)) : undefined;
  }

  const cycle = current === undefined ? path : path.slice(position.get(current));
  return cycle.sort((a, b) => (declIndex.get(a) ?? 0) - (declIndex.get(b) ?? 0));
}

function uniq(values: readonly string[]): string[] {
  return [...new Set(values)];
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}
