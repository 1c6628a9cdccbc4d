import { lstat, mkdir, rename, rm } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import picomatch from 'picomatch';

import { listTree } from '../../utils/tree.js';
import { FileOrganizeError } from '../errors.js';

/**
 * Move installed files according to a part's `organize` mapping. Keys are paths or globs inside
 * the install directory; a value ending in `/` names a directory to move into. Exact keys are
 * applied before globs.
 */
export async function organizeFiles(part: string, mapping: Readonly<Record<string, string>>, installDir: string): Promise<void> {
  const keys = Object.keys(mapping).sort((a, b) => Number(a.includes('*')) - Number(b.includes('*')) || (a < b ? -1 : a > b ? 1 : 0));

  for (const key of keys) {
    const target = mapping[key].replace(/^\/+/, '');
    const intoDir = target.endsWith('/');
    const sources = await expand(installDir, key.replace(/^\/+/, ''));
    if (sources.length === 0) throw new FileOrganizeError(part, `'${key}' matches nothing in the install directory`);
    if (sources.length > 1 && !intoDir) {
      throw new FileOrganizeError(part, `multiple files to be organized into '${target}'. If this is supposed to be a directory, end it with a slash`);
    }

    for (const rel of sources) {
      const destRel = intoDir ? join(target, basename(rel)) : target;
      if (destRel === rel) continue;
      const src = join(installDir, rel);
      const dest = join(installDir, destRel);
      if (await exists(dest)) {
        const st = await lstat(dest);
        if (!st.isDirectory()) throw new FileOrganizeError(part, `trying to organize '${key}' to '${destRel}', but '${destRel}' already exists`);
        await rm(dest, { recursive: true, force: true });
      }
      await mkdir(dirname(dest), { recursive: true });
      await rename(src, dest);
    }
  }
}

async function expand(root: string, pattern: string): Promise<string[]> {
  if (!pattern.includes('*')) return (await exists(join(root, pattern))) ? [pattern] : [];
  const isMatch = picomatch(pattern, { dot: true });
  const matched = (await listTree(root)).filter((e) => isMatch(e.path)).map((e) => e.path);
  // Drop entries already covered by a matched parent directory.
  return matched.filter((p) => !matched.some((q) => q !== p && p.startsWith(`${q}/`)));
}

async function exists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch {
    return false;
  }
}
