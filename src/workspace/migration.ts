import { chmod, copyFile, link, lstat, mkdir, readlink, rm, symlink } from 'node:fs/promises';
import { dirname } from 'node:path';

import { isErrnoException } from '../utils/fs.js';
import type { TreeEntry } from '../utils/tree.js';

export type MigrationMode = 'link' | 'copy';

export interface MigrateOptions {
  /** `link` hard-links files (falling back to a copy); `copy` always copies. */
  mode: MigrationMode;
  /** Files become 0644 (0755 when any execute bit is set) and directories 0755. */
  normalizePermissions?: boolean;
}

/** Recreate one entry at `dest`; an existing non-directory there is replaced. */
export async function migrateEntry(entry: TreeEntry, src: string, dest: string, opts: MigrateOptions): Promise<void> {
  switch (entry.kind) {
    case 'dir': {
      const existing = await lstatOrNull(dest);
      if (existing && !existing.isDirectory()) await rm(dest, { force: true });
      await mkdir(dest, { recursive: true });
      if (opts.normalizePermissions) await chmod(dest, 0o755);
      return;
    }
    case 'symlink': {
      await replaceable(dest);
      await symlink(await readlink(src), dest);
      return;
    }
    case 'file': {
      await replaceable(dest);
      if (opts.mode === 'link' && !opts.normalizePermissions) {
        try {
          await link(src, dest);
          return;
        } catch (err) {
          if (!isErrnoException(err) || !['EXDEV', 'EPERM', 'EMLINK', 'ENOTSUP'].includes(err.code ?? '')) throw err;
        }
      }
      await copyWithMode(src, dest);
      if (opts.normalizePermissions) await chmod(dest, normalizedFileMode((await lstat(src)).mode));
      return;
    }
  }
}

export function normalizedFileMode(mode: number): number {
  return (mode & 0o111) !== 0 ? 0o755 : 0o644;
}

async function copyWithMode(src: string, dest: string): Promise<void> {
  await copyFile(src, dest);
  await chmod(dest, (await lstat(src)).mode & 0o7777);
}

async function replaceable(dest: string): Promise<void> {
  await mkdir(dirname(dest), { recursive: true });
  const existing = await lstatOrNull(dest);
  if (existing) await rm(dest, { recursive: existing.isDirectory(), force: true });
}

async function lstatOrNull(path: string) {
  try {
    return await lstat(path);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return null;
    throw err;
  }
}
