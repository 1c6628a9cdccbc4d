import picomatch from 'picomatch';

import type { TreeEntry } from '../utils/tree.js';

export type PathMatcher = (path: string) => boolean;

/**
 * Compile a stage/prime fileset. Patterns starting with `!` exclude. A pattern naming a
 * directory covers everything below it. With only exclusions, everything else is included.
 */
export function compileFileset(patterns: readonly string[]): PathMatcher {
  const includes = patterns.filter((p) => !p.startsWith('!')).flatMap(expand);
  const excludes = patterns
    .filter((p) => p.startsWith('!'))
    .map((p) => p.slice(1))
    .flatMap(expand);

  const isIncluded = includes.length > 0 ? picomatch(includes, { dot: true }) : () => true;
  const isExcluded = excludes.length > 0 ? picomatch(excludes, { dot: true }) : () => false;
  return (path) => isIncluded(path) && !isExcluded(path);
}

/**
 * Entries of a tree selected by `fileset`. Directories are kept when they match or when they
 * hold a selected entry, so the result can be recreated parents first.
 */
export function selectEntries(entries: readonly TreeEntry[], fileset: readonly string[]): TreeEntry[] {
  const matches = compileFileset(fileset);
  const keepDirs = new Set<string>();
  const selected = new Set<string>();

  for (const e of entries) {
    if (!matches(e.path)) continue;
    selected.add(e.path);
    for (const parent of ancestors(e.path)) keepDirs.add(parent);
  }

  return entries.filter((e) => selected.has(e.path) || (e.kind === 'dir' && keepDirs.has(e.path)));
}

export function ancestors(path: string): string[] {
  const parts = path.split('/');
  const out: string[] = [];
  for (let i = 1; i < parts.length; i++) out.push(parts.slice(0, i).join('/'));
  return out;
}

function expand(pattern: string): string[] {
  const trimmed = pattern.replace(/^\/+/, '').replace(/\/+$/, '');
  if (trimmed === '' || trimmed.endsWith('**')) return [trimmed || '**'];
  return [trimmed, `${trimmed}/**`];
}
