import { mkdir, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, isAbsolute, join, resolve } from 'node:path';

import type { Logger } from '../utils/logger.js';
import { listTree, type TreeEntry, type TreeEntryKind } from '../utils/tree.js';
import { pathsCollide } from './collisions.js';
import type { PartPaths } from './layout.js';
import { migrateEntry } from './migration.js';

export const WHITEOUT_PREFIX = '.wh.';

export function isWhiteout(path: string): boolean {
  return basename(path).startsWith(WHITEOUT_PREFIX);
}

/** `a/.wh.b` hides `a/b`. */
export function whiteoutTarget(path: string): string {
  const name = basename(path).slice(WHITEOUT_PREFIX.length);
  const parent = dirname(path);
  return parent === '.' ? name : `${parent}/${name}`;
}

export function whiteoutFor(path: string): string {
  const parent = dirname(path);
  const name = `${WHITEOUT_PREFIX}${basename(path)}`;
  return parent === '.' ? name : `${parent}/${name}`;
}

interface StackedEntry {
  kind: TreeEntryKind;
  /** Absolute path of the providing layer's copy. */
  abs: string;
}

/**
 * The merged view of `layers`, lowest first: later layers replace paths of earlier ones and
 * whiteouts hide them (with everything below).
 */
export async function stackLayers(layers: readonly string[]): Promise<Map<string, StackedEntry>> {
  const view = new Map<string, StackedEntry>();
  for (const layer of layers) {
    for (const e of await listTree(layer)) {
      if (isWhiteout(e.path)) {
        const target = whiteoutTarget(e.path);
        for (const p of [...view.keys()]) if (p === target || p.startsWith(`${target}/`)) view.delete(p);
        continue;
      }
      const existing = view.get(e.path);
      if (existing && existing.kind === 'dir' && e.kind !== 'dir') {
        for (const p of [...view.keys()]) if (p.startsWith(`${e.path}/`)) view.delete(p);
      }
      view.set(e.path, { kind: e.kind, abs: join(layer, e.path) });
    }
  }
  return view;
}

/**
 * Copy-on-write layers emulated with directories. A part's view is the base, its dependencies'
 * layers and its own layer copied into a scratch directory; its overlay changes are recorded
 * back as a layer of added or changed entries plus whiteouts for deletions.
 */
export class OverlayManager {
  constructor(
    private readonly base: string | undefined,
    private readonly projectDir: string,
    private readonly logger: Logger
  ) {}

  private baseDir(): string[] {
    if (!this.base) return [];
    return [isAbsolute(this.base) ? this.base : resolve(this.projectDir, this.base)];
  }

  /** Lower layers of a part: the base and its dependencies' layers in dependency order. */
  lowerLayers(dependencyLayers: readonly string[]): string[] {
    return [...this.baseDir(), ...dependencyLayers];
  }

  /** Materialise the stacked `layers` into `paths.viewDir` and return it. */
  async mount(paths: PartPaths, layers: readonly string[]): Promise<string> {
    await rm(paths.viewDir, { recursive: true, force: true });
    await mkdir(paths.viewDir, { recursive: true });
    const view = await stackLayers(layers);
    for (const path of [...view.keys()].sort()) {
      const e = view.get(path);
      if (!e) continue;
      await migrateEntry({ path, kind: e.kind }, e.abs, join(paths.viewDir, path), { mode: 'copy' });
    }
    this.logger.debug('Mounted overlay view', { view: paths.viewDir, layers: layers.length });
    return paths.viewDir;
  }

  async unmount(paths: PartPaths): Promise<void> {
    await rm(paths.viewDir, { recursive: true, force: true });
  }

  /**
   * Record what the view gained, changed or lost relative to `lowerLayers` into the part's layer
   * directory, replacing its previous content.
   */
  async recordLayer(paths: PartPaths, lowerLayers: readonly string[]): Promise<TreeEntry[]> {
    const lower = await stackLayers(lowerLayers);
    const current = await listTree(paths.viewDir);
    const present = new Set(current.map((e) => e.path));

    await rm(paths.layerDir, { recursive: true, force: true });
    await mkdir(paths.layerDir, { recursive: true });

    const recorded: TreeEntry[] = [];
    for (const e of current) {
      const below = lower.get(e.path);
      const src = join(paths.viewDir, e.path);
      const changed = !below || below.kind !== e.kind || (e.kind !== 'dir' && (await pathsCollide(src, below.abs)));
      if (!changed) continue;
      await migrateEntry(e, src, join(paths.layerDir, e.path), { mode: 'copy' });
      recorded.push(e);
    }

    for (const path of [...lower.keys()].sort()) {
      if (present.has(path)) continue;
      // Only the topmost removed path needs a whiteout.
      const parent = dirname(path);
      if (parent !== '.' && !present.has(parent) && lower.has(parent)) continue;
      const wh = whiteoutFor(path);
      await mkdir(dirname(join(paths.layerDir, wh)), { recursive: true });
      await writeFile(join(paths.layerDir, wh), '');
      recorded.push({ path: wh, kind: 'file' });
    }

    return recorded;
  }
}
