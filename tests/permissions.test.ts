import { describe, expect, it } from 'vitest';

import { PartDefinitionSchema, PermissionSchema } from '../src/core/parts/types.js';
import { modeOf, permissionsCompatible, permissionsFor } from '../src/workspace/permissions.js';

const perm = (input: { path?: string; mode?: string; owner?: number; group?: number }) => PermissionSchema.parse(input);

describe('permissions', () => {
  it('reads modes written with or without an octal prefix', () => {
    expect(['755', '0755', '0o755'].map((mode) => modeOf(perm({ mode })))).toEqual([0o755, 0o755, 0o755]);
    expect(modeOf(perm({ owner: 0, group: 0 }))).toBeNull();
  });

  it('selects the entries whose pattern covers a path', () => {
    const list = [perm({ mode: '644' }), perm({ path: 'bin/*', mode: '755' }), perm({ path: 'etc/**', mode: '600' })];
    expect(permissionsFor('bin/tool', list).map((p) => p.mode)).toEqual(['644', '755']);
    expect(permissionsFor('etc/app/.secret', list).map((p) => p.mode)).toEqual(['644', '600']);
    expect(permissionsFor('bin/sub/tool', list).map((p) => p.mode)).toEqual(['644']);
  });

  it('compares the combined outcome of two lists', () => {
    expect(permissionsCompatible([], [perm({ mode: '600' })])).toBe(true);
    expect(permissionsCompatible([perm({ mode: '644' }), perm({ mode: '0755' })], [perm({ mode: '0o755' })])).toBe(true);
    expect(permissionsCompatible([perm({ mode: '755' })], [perm({ mode: '755', owner: 1, group: 1 })])).toBe(false);
    expect(permissionsCompatible([perm({ mode: '755' })], [perm({ owner: 0, group: 0 })])).toBe(false);
  });

  it('rejects an owner without a group and modes that are not octal', () => {
    const res = PartDefinitionSchema.safeParse({ name: 'p', permissions: [{ owner: 1 }, { mode: 'rwx' }] });
    expect(res.success).toBe(false);
    if (res.success) return;
    expect(res.error.issues.map((i) => [i.path.join('.'), i.message])).toEqual([
      ['permissions.0', 'owner and group must be set together'],
      ['permissions.1.mode', 'mode must be an octal number such as 755']
    ]);
  });
});
