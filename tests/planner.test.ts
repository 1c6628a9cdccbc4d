import { describe, expect, it } from 'vitest';

import { actionKey, type Action } from '../src/core/actions.js';
import { CycleError, PartDefinitionError, UnknownPartError } from '../src/core/errors.js';
import type { PartDefinitionInput } from '../src/core/parts/types.js';
import { fileExists } from '../src/utils/fs.js';
import { testProject } from './helpers.js';

const keys = (actions: readonly Action[]) => actions.map(actionKey);

const chain: PartDefinitionInput[] = [{ name: 'a' }, { name: 'b', after: ['a'] }, { name: 'c', after: ['b'] }];

describe('ActionPlanner', () => {
  it('plans every step of a fresh project in dependency order', async () => {
    const project = await testProject('plan');
    const actions = await project.create(chain).plan('prime');

    expect(keys(actions)).toEqual([
      'a:pull',
      'b:pull',
      'c:pull',
      'a:build',
      'a:stage',
      'b:build',
      'b:stage',
      'c:build',
      'c:stage',
      'a:prime',
      'b:prime',
      'c:prime'
    ]);
    expect(actions.every((a) => a.reason === 'never-run' && a.type === 'run')).toBe(true);
  });

  it('produces a valid linearisation: prerequisites always come first', async () => {
    const project = await testProject('plan');
    const parts: PartDefinitionInput[] = [
      { name: 'app', after: ['net', 'ui'] },
      { name: 'ui', after: ['core'] },
      { name: 'net', after: ['core'] },
      { name: 'core' },
      { name: 'docs' }
    ];
    const actions = await project.create(parts).plan('prime');
    const position = new Map(keys(actions).map((k, i) => [k, i]));
    const deps: Record<string, string[]> = { app: ['net', 'ui'], ui: ['core'], net: ['core'], core: [], docs: [] };
    const prereq: Record<string, string | null> = { pull: null, build: 'stage', stage: 'stage', prime: 'prime' };
    const previous: Record<string, string | null> = { pull: null, build: 'pull', stage: 'build', prime: 'stage' };

    expect(actions).toHaveLength(20);
    for (const a of actions) {
      const at = position.get(actionKey(a)) ?? -1;
      const prev = previous[a.step];
      if (prev) expect(position.get(`${a.part}:${prev}`) ?? Infinity).toBeLessThan(at);
      const needed = prereq[a.step];
      if (needed) for (const d of deps[a.part]) expect(position.get(`${d}:${needed}`) ?? Infinity).toBeLessThan(at);
    }
  });

  it('brings dependencies only as far as the target requires', async () => {
    const project = await testProject('plan');
    const actions = await project.create(chain).plan('build', ['c']);
    expect(keys(actions)).toEqual(['a:pull', 'b:pull', 'c:pull', 'a:build', 'a:stage', 'b:build', 'b:stage', 'c:build']);
  });

  it('plans nothing once everything has run', async () => {
    const project = await testProject('plan');
    const lcm = project.create(chain);
    const outcome = await lcm.execute(await lcm.plan('prime'));
    expect(outcome.ok).toBe(true);

    expect(await lcm.plan('prime')).toEqual([]);
    expect(await project.create(chain).plan('prime')).toEqual([]);
  });

  it('reruns dependents of a step marked dirty', async () => {
    const project = await testProject('plan');
    const parts: PartDefinitionInput[] = [{ name: 'a', after: ['b'] }, { name: 'b' }];
    const lcm = project.create(parts);
    await lcm.execute(await lcm.plan('prime'));

    const marked = await lcm.markDirty('b', 'build');
    expect(marked.map(actionKey)).toEqual(['b:build', 'b:stage', 'b:prime', 'a:build', 'a:stage', 'a:prime']);

    const actions = await lcm.plan('prime', ['a']);
    expect(actions.map((a) => [actionKey(a), a.reason])).toEqual([
      ['b:build', 'forced'],
      ['b:stage', 'downstream-invalidated'],
      ['a:build', 'dependency-changed'],
      ['a:stage', 'dependency-changed'],
      ['b:prime', 'downstream-invalidated'],
      ['a:prime', 'dependency-changed']
    ]);
    expect(actions[2].detail).toBe("stage for part 'b' changed");
  });

  it("reruns only a part's own steps when only its properties change", async () => {
    const project = await testProject('plan');
    const parts = (flag: string): PartDefinitionInput[] => [
      { name: 'a', plugin: 'passthrough', properties: { flag } },
      { name: 'b', plugin: 'passthrough', properties: { flag: 'fixed' } }
    ];
    const first = project.create(parts('one'));
    await first.execute(await first.plan('prime'));

    const actions = await project.create(parts('two')).plan('prime');
    expect(actions).toEqual([
      { part: 'a', step: 'build', reason: 'properties-changed', type: 'run', detail: "'flag' property changed" },
      { part: 'a', step: 'stage', reason: 'downstream-invalidated', type: 'run', detail: "build for part 'a' will run" },
      { part: 'a', step: 'prime', reason: 'downstream-invalidated', type: 'run', detail: "stage for part 'a' will run" }
    ]);
  });

  it('reruns every step of the selected parts when forced', async () => {
    const project = await testProject('plan');
    const lcm = project.create(chain);
    await lcm.execute(await lcm.plan('prime'));

    const actions = await lcm.plan('build', ['b'], { force: true });
    expect(actions.map((a) => [actionKey(a), a.type, a.reason])).toEqual([
      ['b:pull', 'rerun', 'forced'],
      ['b:build', 'rerun', 'forced']
    ]);
  });

  it('explains why a step would or would not run', async () => {
    const project = await testProject('plan');
    const lcm = project.create(chain);
    expect(await lcm.explain('b', 'build')).toEqual({ part: 'b', step: 'build', status: 'never-run', reason: 'never-run', detail: 'never run' });

    await lcm.execute(await lcm.plan('prime'));
    expect(await lcm.explain('b', 'build')).toEqual({ part: 'b', step: 'build', status: 'valid' });

    await lcm.markDirty('a', 'stage');
    expect(await lcm.explain('b', 'build')).toEqual({
      part: 'b',
      step: 'build',
      status: 'dirty',
      reason: 'dependency-changed',
      detail: "stage for part 'a' changed"
    });
    await expect(lcm.explain('ghost', 'build')).rejects.toThrow(UnknownPartError);
  });

  it('fails a cyclic project before touching the work directory', async () => {
    const project = await testProject('plan');
    expect(() => project.create([{ name: 'a', after: ['b'] }, { name: 'b', after: ['a'] }])).toThrow(CycleError);
    expect(() => project.create([{ name: 'a', after: ['b'] }, { name: 'b', after: ['a'] }])).toThrow("Parts involved: 'a', 'b'");
    expect(await fileExists(project.workDir)).toBe(false);
  });

  it('rejects malformed part definitions with every problem listed', async () => {
    const project = await testProject('plan');
    let caught: unknown;
    try {
      project.create([{ name: 'Bad Name' }, { name: 'ok', plugin: '' }]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(PartDefinitionError);
    if (!(caught instanceof PartDefinitionError)) return;
    expect(caught.details).toContain("part 'Bad Name': name: part names must be lowercase alphanumerics");
    expect(caught.details).toContain("part 'ok': plugin: String must contain at least 1 character(s)");
  });
});
