import { describe, expect, it } from 'vitest';

import { buildPartGraph } from '../src/core/parts/graph.js';
import { PartDefinitionSchema, ProjectOptionsSchema, type PartDefinitionInput, type ProjectOptionsInput } from '../src/core/parts/types.js';
import { SourceRegistry } from '../src/core/sources/registry.js';
import { describeInputChange, fingerprintInputs, type FingerprintContext } from '../src/core/state/fingerprint.js';
import type { Step } from '../src/core/steps.js';
import { pluginsWithPassthrough } from './helpers.js';

function resolved(def: PartDefinitionInput) {
  const graph = buildPartGraph([PartDefinitionSchema.parse(def)], { plugins: pluginsWithPassthrough(), sources: SourceRegistry.withBuiltins() });
  return graph.part(def.name);
}

function ctx(overrides: Partial<FingerprintContext> = {}, options: Partial<ProjectOptionsInput> = {}): FingerprintContext {
  return {
    options: ProjectOptionsSchema.parse({ workDir: '/w', projectDir: '/p', parallelBuildCount: 4, targetArch: 'x64', ...options }),
    sourceIdentity: null,
    previous: null,
    dependencies: {},
    ...overrides
  };
}

function fp(def: PartDefinitionInput, step: Step, c: FingerprintContext = ctx()): string {
  return fingerprintInputs(resolved(def), step, c).fingerprint;
}

describe('fingerprints', () => {
  const base: PartDefinitionInput = { name: 'lib', plugin: 'passthrough', properties: { jobs: 2, flags: ['-O2'] } };

  it('is deterministic and independent of property order', () => {
    const reordered: PartDefinitionInput = { name: 'lib', plugin: 'passthrough', properties: { flags: ['-O2'], jobs: 2 } };
    expect(fp(base, 'build')).toBe(fp(base, 'build'));
    expect(fp(reordered, 'build')).toBe(fp(base, 'build'));
  });

  it('differs between steps with equal inputs', () => {
    expect(fp(base, 'stage')).not.toBe(fp(base, 'prime'));
  });

  it('changes when a property of interest changes', () => {
    const changed = { ...base, properties: { jobs: 3, flags: ['-O2'] } };
    expect(fp(changed, 'build')).not.toBe(fp(base, 'build'));
  });

  it('ignores plugin properties outside the pull properties for pull', () => {
    const changed = { ...base, properties: { jobs: 3, flags: ['-O2'] } };
    expect(fp(changed, 'pull')).toBe(fp(base, 'pull'));
    const branch = { ...base, properties: { ...base.properties, 'source-branch': 'next' } };
    expect(fp(branch, 'pull')).not.toBe(fp(base, 'pull'));
  });

  it('folds in the source identity for pull only', () => {
    expect(fp(base, 'pull', ctx({ sourceIdentity: 'aaa' }))).not.toBe(fp(base, 'pull', ctx({ sourceIdentity: 'bbb' })));
    expect(fp(base, 'build', ctx({ sourceIdentity: 'aaa' }))).toBe(fp(base, 'build', ctx({ sourceIdentity: 'bbb' })));
  });

  it('chains through the previous step and consumed dependencies', () => {
    expect(fp(base, 'build', ctx({ previous: 'p1' }))).not.toBe(fp(base, 'build', ctx({ previous: 'p2' })));
    expect(fp(base, 'build', ctx({ dependencies: { 'dep:stage': 'f1' } }))).not.toBe(fp(base, 'build', ctx({ dependencies: { 'dep:stage': 'f2' } })));
  });

  it('takes only the options a step depends on', () => {
    expect(fp(base, 'build', ctx({}, { targetArch: 'arm64' }))).not.toBe(fp(base, 'build'));
    expect(fp(base, 'build', ctx({}, { parallelBuildCount: 16 }))).toBe(fp(base, 'build'));
    expect(fp(base, 'prime', ctx({}, { targetArch: 'arm64' }))).toBe(fp(base, 'prime'));
    expect(fp(base, 'stage', ctx({}, { allowOverwrite: ['a', 'b'] }))).toBe(fp(base, 'stage', ctx({}, { allowOverwrite: ['b', 'a'] })));
  });
});

describe('describeInputChange', () => {
  const make = (props: Record<string, unknown>) => fingerprintInputs(resolved({ name: 'lib', plugin: 'passthrough', properties: props }), 'build', ctx()).inputs;

  it('names the plugin property that changed', () => {
    expect(describeInputChange('build', make({ 'make-parameters': ['A=1'] }), make({ 'make-parameters': ['A=2'] }))).toBe(
      "'make-parameters' property changed"
    );
  });

  it('names a changed dependency', () => {
    const before = fingerprintInputs(resolved({ name: 'lib' }), 'build', ctx({ dependencies: { 'zlib:stage': 'f1' } })).inputs;
    const after = fingerprintInputs(resolved({ name: 'lib' }), 'build', ctx({ dependencies: { 'zlib:stage': 'f2' } })).inputs;
    expect(describeInputChange('build', before, after)).toBe("stage for part 'zlib' changed");
  });

  it('returns null when nothing differs', () => {
    expect(describeInputChange('build', make({ a: 1 }), make({ a: 1 }))).toBeNull();
  });
});
