import { createHash } from 'node:crypto';
import { lstat, readdir, readFile, readlink } from 'node:fs/promises';
import { join } from 'node:path';

export type TreeEntryKind = 'file' | 'dir' | 'symlink';

export interface TreeEntry {
  /** POSIX path relative to the tree root. */
  path: string;
  kind: TreeEntryKind;
}

export interface ListTreeOptions {
  /** Directory names skipped at any depth. */
  ignore?: readonly string[];
  /** Relative paths skipped together with everything below them. */
  exclude?: readonly string[];
}

/**
 * List every entry below `root`, parents before children, sorted within each directory.
 * Symlinks are reported as such and never followed. A missing root yields an empty list.
 */
export async function listTree(root: string, opts: ListTreeOptions = {}): Promise<TreeEntry[]> {
  const out: TreeEntry[] = [];
  const ignore = opts.ignore ?? [];
  const exclude = opts.exclude ?? [];

  async function walk(rel: string) {
    const abs = rel ? join(root, rel) : root;
    let entries;
    try {
      entries = await readdir(abs, { withFileTypes: true });
    } catch (err) {
      if (rel === '') return;
      throw err;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const e of entries) {
      const childRel = rel ? `${rel}/${e.name}` : e.name;
      if (exclude.includes(childRel)) continue;
      if (e.isSymbolicLink()) {
        out.push({ path: childRel, kind: 'symlink' });
      } else if (e.isDirectory()) {
        if (ignore.includes(e.name)) continue;
        out.push({ path: childRel, kind: 'dir' });
        await walk(childRel);
      } else if (e.isFile()) {
        out.push({ path: childRel, kind: 'file' });
      }
    }
  }

  await walk('');
  return out;
}

/**
 * Content hash of a directory tree: paths, kinds, executable bits, file bytes and link targets.
 * Timestamps and ownership do not take part.
 */
export async function hashTree(root: string, opts: ListTreeOptions = {}): Promise<{ sha256: string; files: number }> {
  const h = createHash('sha256');
  let files = 0;
  for (const entry of await listTree(root, opts)) {
    const abs = join(root, entry.path);
    h.update(`${entry.kind} ${entry.path}\n`, 'utf8');
    if (entry.kind === 'symlink') {
      h.update(await readlink(abs), 'utf8');
    } else if (entry.kind === 'file') {
      const st = await lstat(abs);
      h.update((st.mode & 0o111) !== 0 ? 'x' : '-', 'utf8');
      h.update(await readFile(abs));
      files += 1;
    }
    h.update('\n', 'utf8');
  }
  return { sha256: h.digest('hex'), files };
}
