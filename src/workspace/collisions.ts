import { lstat, readFile, readlink } from 'node:fs/promises';

import { isNotFound } from '../utils/fs.js';

/**
 * Whether placing `incoming` at `existing` would change what is there: symlinks to different
 * targets, a symlink against anything else, a directory against a file, or files whose bytes
 * differ. Two directories never collide. A missing side never collides.
 */
export async function pathsCollide(incoming: string, existing: string): Promise<boolean> {
  const [a, b] = await Promise.all([lstatOrNull(incoming), lstatOrNull(existing)]);
  if (!a || !b) return false;

  if (a.isSymbolicLink() || b.isSymbolicLink()) {
    if (!(a.isSymbolicLink() && b.isSymbolicLink())) return true;
    const [ta, tb] = await Promise.all([readlink(incoming), readlink(existing)]);
    return ta !== tb;
  }

  if (a.isDirectory() !== b.isDirectory()) return true;
  if (a.isDirectory()) return false;

  if (a.dev === b.dev && a.ino === b.ino) return false;
  if (a.size !== b.size) return true;
  const [ca, cb] = await Promise.all([readFile(incoming), readFile(existing)]);
  return !ca.equals(cb);
}

async function lstatOrNull(path: string) {
  try {
    return await lstat(path);
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}
