import { chmod, chown } from 'node:fs/promises';
import picomatch from 'picomatch';

import type { Permission } from '../core/parts/types.js';

/** The permissions of `list` whose pattern covers `path`, in declaration order. */
export function permissionsFor(path: string, list: readonly Permission[]): Permission[] {
  return list.filter((p) => p.path === '*' || picomatch.isMatch(path, p.path, { dot: true }));
}

export function modeOf(permission: Permission): number | null {
  if (permission.mode === undefined) return null;
  return Number.parseInt(permission.mode.replace(/^0o/, ''), 8);
}

/** Apply every entry to `target` in order; callers filter with `permissionsFor` first. */
export async function applyPermissions(target: string, list: readonly Permission[]): Promise<void> {
  for (const p of list) {
    const mode = modeOf(p);
    if (mode !== null) await chmod(target, mode);
    if (p.owner !== undefined && p.group !== undefined) await chown(target, p.owner, p.group);
  }
}

/**
 * Whether applying `left` and `right` to the same path ends with the same owner, group and
 * mode. An empty side sets nothing and so agrees with anything.
 */
export function permissionsCompatible(left: readonly Permission[], right: readonly Permission[]): boolean {
  if (left.length === 0 || right.length === 0) return true;
  const a = squash(left);
  const b = squash(right);
  return a.owner === b.owner && a.group === b.group && a.mode === b.mode;
}

function squash(list: readonly Permission[]): { owner?: number; group?: number; mode: number | null } {
  let owner: number | undefined;
  let group: number | undefined;
  let mode: number | null = null;
  for (const p of list) {
    owner = p.owner ?? owner;
    group = p.group ?? group;
    mode = modeOf(p) ?? mode;
  }
  return { owner, group, mode };
}
