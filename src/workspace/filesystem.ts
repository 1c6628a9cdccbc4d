import { lstat, rm, rmdir } from 'node:fs/promises';
import { join } from 'node:path';

import { ConflictError } from '../core/errors.js';
import type { ResolvedPart } from '../core/parts/graph.js';
import type { Permission, ProjectOptions } from '../core/parts/types.js';
import type { Step } from '../core/steps.js';
import { isErrnoException, isNotFound } from '../utils/fs.js';
import { quietLogger, type Logger } from '../utils/logger.js';
import { listTree, type TreeEntry } from '../utils/tree.js';
import { pathsCollide } from './collisions.js';
import { ancestors, selectEntries } from './filesets.js';
import { partPaths, sharedAreaDir, type SharedArea, type WorkspacePaths } from './layout.js';
import { MergeLock } from './merge-lock.js';
import { migrateEntry, type MigrateOptions } from './migration.js';
import { isWhiteout, whiteoutTarget } from './overlay.js';
import { OwnershipIndex, type ClaimEntry } from './ownership.js';
import { applyPermissions, permissionsCompatible, permissionsFor } from './permissions.js';

/** What a merge placed in a shared area, relative to the area root. */
export interface MergeResult {
  files: string[];
  directories: string[];
}

const MIGRATION: Record<SharedArea, MigrateOptions> = {
  stage: { mode: 'link' },
  prime: { mode: 'copy', normalizePermissions: true },
  overlay: { mode: 'copy' }
};

/**
 * Merges per-part outputs into the shared stage, prime and overlay areas and takes them back out.
 *
 * Every placed path is recorded in the area's ownership index; cleaning a part removes only
 * the paths it still owns and puts back the copy of the part it had overwritten, if any.
 */
export class FilesystemLayout {
  constructor(
    readonly ws: WorkspacePaths,
    private readonly options: ProjectOptions,
    private readonly logger: Logger = quietLogger(),
    private readonly lock: MergeLock = new MergeLock(),
    /** Declared `permissions` of a part, for parts other than the one being merged. */
    private readonly permissionsOf: (part: string) => readonly Permission[] = () => []
  ) {}

  /** Merge the part's install tree, filtered by its `stage` fileset, into the stage area. */
  async stage(part: ResolvedPart): Promise<MergeResult> {
    const name = part.definition.name;
    const installDir = partPaths(this.ws, name).installDir;
    const entries = selectEntries(await listTree(installDir), part.definition.stage);
    return await this.merge('stage', name, entries, installDir, part.definition.permissions);
  }

  /**
   * Copy the part's staged paths, filtered by its `prime` fileset, from the stage area into the
   * prime area, normalising permissions on the way.
   */
  async prime(part: ResolvedPart, staged: MergeResult): Promise<MergeResult> {
    const name = part.definition.name;
    const known = await this.entriesAt(this.ws.stageDir, [...staged.directories, ...staged.files]);
    const entries = selectEntries(known, part.definition.prime);
    return await this.merge('prime', name, entries, this.ws.stageDir, part.definition.permissions);
  }

  /** Merge the part's overlay layer into the shared overlay area; whiteouts delete what they hide. */
  async applyLayer(part: ResolvedPart): Promise<MergeResult> {
    const name = part.definition.name;
    const layerDir = partPaths(this.ws, name).layerDir;
    return await this.merge('overlay', name, await listTree(layerDir), layerDir);
  }

  /**
   * Claim `entries` found under the area after something other than a migration (a `run`
   * override) has written them.
   */
  async adopt(area: SharedArea, part: string, entries: readonly TreeEntry[]): Promise<MergeResult> {
    return await this.lock.withLock(sharedAreaDir(this.ws, area), async () => {
      const index = await OwnershipIndex.load(this.ws, area, this.logger);
      await index.beginClaim(part, entries);
      await index.commitClaim();
      return toResult(entries);
    });
  }

  /** Undo a step's effect on the part's directories and on the shared areas. */
  async clean(part: string, step: Step): Promise<void> {
    const p = partPaths(this.ws, part);
    switch (step) {
      case 'pull':
        await rm(p.srcDir, { recursive: true, force: true });
        return;
      case 'overlay':
        await rm(p.layerDir, { recursive: true, force: true });
        await rm(p.viewDir, { recursive: true, force: true });
        return;
      case 'build':
        await rm(p.buildDir, { recursive: true, force: true });
        await rm(p.installDir, { recursive: true, force: true });
        return;
      case 'stage':
        await this.cleanArea('stage', part);
        await this.cleanArea('overlay', part);
        return;
      case 'prime':
        await this.cleanArea('prime', part);
        return;
    }
  }

  /** Remove what `part` owns in `area`, restoring the copies of earlier owners it had overwritten. */
  async cleanArea(area: SharedArea, part: string): Promise<void> {
    const areaDir = sharedAreaDir(this.ws, area);
    await this.lock.withLock(areaDir, async () => {
      const index = await OwnershipIndex.load(this.ws, area, this.logger);
      const releases = index.release(part);

      for (const r of releases) {
        const dest = join(areaDir, r.path);
        if (r.kind === 'dir') {
          if (r.orphaned) await removeEmptyDir(dest);
          continue;
        }
        if (r.kind === 'whiteout') {
          if (!r.restoreFrom) continue;
          // The whiteout removed the hidden path with everything below it.
          const kind = await this.restore(area, r.restoreFrom, r.path, dest);
          if (kind) index.retype(r.path, kind);
          for (const below of index.below(r.path)) {
            if (below.record.kind === 'whiteout') continue;
            await this.restore(area, below.record.owner, below.path, join(areaDir, below.path));
          }
          continue;
        }
        if (r.restoreFrom) {
          const kind = await this.restore(area, r.restoreFrom, r.path, dest);
          if (kind) index.retype(r.path, kind);
        } else {
          await rm(dest, { force: true });
        }
      }

      await index.save();
      this.logger.debug(`Cleaned ${area} for part '${part}'`, { paths: releases.length });
    });
  }

  /** Where a part's copy of a shared-area path comes from. */
  private restoreSourceDir(area: SharedArea, part: string): string {
    const p = partPaths(this.ws, part);
    return area === 'overlay' ? p.layerDir : p.installDir;
  }

  /** Put `owner`'s copy of `path` back in place; `null` when that copy is gone. */
  private async restore(area: SharedArea, owner: string, path: string, dest: string): Promise<TreeEntry['kind'] | null> {
    const src = join(this.restoreSourceDir(area, owner), path);
    const st = await lstatOrNull(src);
    if (!st) {
      this.logger.warn(`Cannot restore '${path}' from part '${owner}': the file no longer exists`, { area });
      await rm(dest, { recursive: true, force: true });
      return null;
    }
    const kind = st.isSymbolicLink() ? 'symlink' : st.isDirectory() ? 'dir' : 'file';
    const permissions = area === 'overlay' ? [] : permissionsFor(path, this.permissionsOf(owner));
    await migrateEntry({ path, kind }, src, dest, migrationFor(area, permissions));
    if (kind !== 'symlink') await applyPermissions(dest, permissions);
    this.logger.debug(`Restored '${path}' from part '${owner}'`, { area });
    return kind;
  }

  private async merge(
    area: SharedArea,
    part: string,
    entries: readonly TreeEntry[],
    srcDir: string,
    permissions: readonly Permission[] = []
  ): Promise<MergeResult> {
    const areaDir = sharedAreaDir(this.ws, area);
    return await this.lock.withLock(areaDir, async () => {
      const index = await OwnershipIndex.load(this.ws, area, this.logger);
      const claims: ClaimEntry[] = [];
      const conflicts = new Map<string | null, string[]>();

      for (const e of entries) {
        if (area === 'overlay' && isWhiteout(e.path)) {
          claims.push({ path: whiteoutTarget(e.path), kind: 'whiteout' });
          continue;
        }
        claims.push(e);

        const dest = join(areaDir, e.path);
        const owner = index.ownerOf(e.path);
        if (!(await pathsCollide(join(srcDir, e.path), dest)) && this.permissionsAgree(e, part, owner, permissions)) continue;
        if (owner === part) continue;
        if (this.mayOverwrite(part, owner)) {
          this.logger.warn(`Part '${part}' overwrites '${e.path}' in ${area}${owner ? ` (owned by '${owner}')` : ''}`);
          continue;
        }
        const paths = conflicts.get(owner) ?? [];
        paths.push(e.path);
        conflicts.set(owner, paths);
      }

      const [first] = conflicts;
      if (first) {
        const [otherPart, paths] = first;
        throw new ConflictError(part, otherPart, paths);
      }

      await index.beginClaim(part, claims);
      const dirModes: Array<{ dest: string; permissions: Permission[] }> = [];
      for (const e of entries) {
        const dest = join(areaDir, e.path);
        if (area === 'overlay' && isWhiteout(e.path)) {
          await rm(join(areaDir, whiteoutTarget(e.path)), { recursive: true, force: true });
          continue;
        }
        const matching = permissionsFor(e.path, permissions);
        await migrateEntry(e, join(srcDir, e.path), dest, migrationFor(area, matching));
        if (matching.length === 0 || e.kind === 'symlink') continue;
        // A directory's mode may forbid writing into it, so directories go last, deepest first.
        if (e.kind === 'dir') dirModes.push({ dest, permissions: matching });
        else await applyPermissions(dest, matching);
      }
      for (const d of dirModes.reverse()) await applyPermissions(d.dest, d.permissions);
      await index.commitClaim();

      return toResult(entries.filter((e) => !(area === 'overlay' && isWhiteout(e.path))));
    });
  }

  /** Two parts placing the same file must not ask for different modes or ownership. */
  private permissionsAgree(entry: TreeEntry, part: string, owner: string | null, permissions: readonly Permission[]): boolean {
    if (entry.kind === 'dir' || owner === null || owner === part) return true;
    return permissionsCompatible(permissionsFor(entry.path, permissions), permissionsFor(entry.path, this.permissionsOf(owner)));
  }

  private mayOverwrite(part: string, owner: string | null): boolean {
    const allowed = this.options.allowOverwrite;
    return allowed.includes(part) || (owner !== null && allowed.includes(owner));
  }

  /** Kinds of the listed paths under `root`, parents first; missing paths are dropped. */
  private async entriesAt(root: string, paths: readonly string[]): Promise<TreeEntry[]> {
    const wanted = new Set<string>();
    for (const p of paths) {
      wanted.add(p);
      for (const a of ancestors(p)) wanted.add(a);
    }
    const out: TreeEntry[] = [];
    for (const path of [...wanted].sort()) {
      const st = await lstatOrNull(join(root, path));
      if (!st) continue;
      out.push({ path, kind: st.isSymbolicLink() ? 'symlink' : st.isDirectory() ? 'dir' : 'file' });
    }
    return out;
  }
}

/** Files that get their own permissions are copied; a hard link would change the source too. */
function migrationFor(area: SharedArea, permissions: readonly Permission[]): MigrateOptions {
  const base = MIGRATION[area];
  if (permissions.length === 0 || base.mode !== 'link') return base;
  return { ...base, mode: 'copy' };
}

function toResult(entries: readonly { path: string; kind: string }[]): MergeResult {
  return {
    files: entries.filter((e) => e.kind !== 'dir').map((e) => e.path),
    directories: entries.filter((e) => e.kind === 'dir').map((e) => e.path)
  };
}

async function removeEmptyDir(path: string): Promise<void> {
  try {
    await rmdir(path);
  } catch (err) {
    if (isNotFound(err)) return;
    if (isErrnoException(err) && (err.code === 'ENOTEMPTY' || err.code === 'EEXIST' || err.code === 'ENOTDIR')) return;
    throw err;
  }
}

async function lstatOrNull(path: string) {
  try {
    return await lstat(path);
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}
