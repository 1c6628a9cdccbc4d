import { describe, expect, it } from 'vitest';

import {
  CycleError,
  DuplicatePartError,
  PluginResolutionError,
  PropertyValidationError,
  UnknownDependencyError,
  UnknownPartError
} from '../src/core/errors.js';
import { buildPartGraph } from '../src/core/parts/graph.js';
import { PartDefinitionSchema, type PartDefinitionInput } from '../src/core/parts/types.js';
import { PluginRegistry } from '../src/core/plugins/registry.js';
import { SourceRegistry } from '../src/core/sources/registry.js';

function graph(parts: PartDefinitionInput[]) {
  return buildPartGraph(
    parts.map((p) => PartDefinitionSchema.parse(p)),
    { plugins: PluginRegistry.withBuiltins(), sources: SourceRegistry.withBuiltins() }
  );
}

describe('PartGraph', () => {
  it('orders dependencies first and keeps declaration order among independent parts', () => {
    const g = graph([
      { name: 'app', after: ['libb', 'liba'] },
      { name: 'libb', after: ['liba'] },
      { name: 'tools' },
      { name: 'liba' }
    ]);
    expect(g.topologicalOrder().map((p) => p.definition.name)).toEqual(['tools', 'liba', 'libb', 'app']);
    expect(g.names()).toEqual(['app', 'libb', 'tools', 'liba']);
  });

  it('answers direct and transitive dependency queries in topological order', () => {
    const g = graph([{ name: 'app', after: ['libb'] }, { name: 'libb', after: ['liba'] }, { name: 'liba' }]);
    expect(g.dependenciesOf('app')).toEqual(['libb']);
    expect(g.dependenciesOf('app', { transitive: true })).toEqual(['liba', 'libb']);
    expect(g.dependentsOf('liba')).toEqual(['libb']);
    expect(g.dependentsOf('liba', { transitive: true })).toEqual(['libb', 'app']);
  });

  it('selects parts in topological order and rejects unknown names', () => {
    const g = graph([{ name: 'app', after: ['lib'] }, { name: 'lib' }]);
    expect(g.select(['app', 'lib'])).toEqual(['lib', 'app']);
    expect(g.select()).toEqual(['lib', 'app']);
    expect(() => g.select(['nope'])).toThrow(UnknownPartError);
  });

  it('names both parts of a cycle', () => {
    let caught: unknown;
    try {
      graph([{ name: 'a', after: ['b'] }, { name: 'b', after: ['a'] }]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CycleError);
    if (!(caught instanceof CycleError)) return;
    expect(caught.partNames).toEqual(['a', 'b']);
    expect(caught.details).toBe("Parts involved: 'a', 'b'");
  });

  it('reports only the parts on the cycle, not those behind it', () => {
    let caught: unknown;
    try {
      graph([{ name: 'top', after: ['x'] }, { name: 'x', after: ['y'] }, { name: 'y', after: ['z'] }, { name: 'z', after: ['x'] }]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CycleError);
    if (caught instanceof CycleError) expect(caught.partNames).toEqual(['x', 'y', 'z']);
  });

  it('rejects unknown dependencies and duplicate names', () => {
    expect(() => graph([{ name: 'a', after: ['ghost'] }])).toThrow(UnknownDependencyError);
    expect(() => graph([{ name: 'a' }, { name: 'a' }])).toThrow(DuplicatePartError);
  });

  it('rejects unregistered plugins and source types', () => {
    expect(() => graph([{ name: 'a', plugin: 'cmake' }])).toThrow(PluginResolutionError);
    expect(() => graph([{ name: 'a', source: { type: 'git', location: 'https://example.invalid/a.git' } }])).toThrow(
      "Part 'a' uses source type 'git', which is not registered."
    );
  });

  it('reports every part with invalid properties at once', () => {
    let caught: unknown;
    try {
      graph([
        { name: 'a', plugin: 'make', properties: { 'make-parameters': 'oops' } },
        { name: 'b', plugin: 'nil', properties: { bogus: true } },
        { name: 'c', plugin: 'make', properties: { 'make-parameters': ['V=1'] } }
      ]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(PropertyValidationError);
    if (!(caught instanceof PropertyValidationError)) return;
    expect(caught.errors.map((e) => e.partName)).toEqual(['a', 'b']);
    expect(caught.brief).toBe("Part property validation failed for 'a', 'b'.");
    expect(caught.errors[0].problems).toEqual(['make-parameters: Expected array, received string']);
    expect(caught.errors[1].problems).toEqual(["properties: Unrecognized key(s) in object: 'bogus'"]);
  });

  it('freezes part definitions', () => {
    const g = graph([{ name: 'a', properties: {} }]);
    expect(Object.isFrozen(g.part('a').definition)).toBe(true);
    expect(Object.isFrozen(g.part('a').definition.after)).toBe(true);
  });
});
