import { join } from 'node:path';
import { z } from 'zod';

import { isNotFound, readJson, writeJsonAtomic } from '../utils/fs.js';
import type { Logger } from '../utils/logger.js';
import type { SharedArea, WorkspacePaths } from './layout.js';

const OWNERSHIP_FORMAT_VERSION = 1;

export const OwnedKind = z.enum(['file', 'dir', 'symlink', 'whiteout']);
export type OwnedKind = z.infer<typeof OwnedKind>;

const OwnershipRecord = z.object({
  kind: OwnedKind,
  owner: z.string(),
  /** Earlier claimants whose copy was overwritten, most recent last. */
  shadowed: z.array(z.string())
});

const ClaimSchema = z.object({
  owner: z.string(),
  entries: z.array(z.object({ path: z.string(), kind: OwnedKind }))
});

const OwnershipFileSchema = z.object({
  version: z.literal(OWNERSHIP_FORMAT_VERSION),
  entries: z.record(z.string(), OwnershipRecord),
  /** Written before a merge touches the tree; folded into `entries` once the merge is done. */
  pending: ClaimSchema.optional()
});

export type OwnershipRecord = z.infer<typeof OwnershipRecord>;
export type OwnershipClaim = z.infer<typeof ClaimSchema>;

export interface ClaimEntry {
  path: string;
  kind: OwnedKind;
}

/** What releasing a part's claim on one path means for the tree. */
export interface Release {
  path: string;
  kind: OwnedKind;
  /** The part whose copy goes back in place, if an earlier claimant remains. */
  restoreFrom: string | null;
  /** The path was the released part's: it is removed unless restored. */
  wasOwner: boolean;
  /** No claimant remains. */
  orphaned: boolean;
}

/**
 * Who placed each path of a shared area. Persisted per area, so cleaning a part never depends on
 * scanning the tree or on the part's own records.
 */
export class OwnershipIndex {
  private constructor(
    private readonly path: string,
    private readonly entries: Map<string, OwnershipRecord>,
    private pending: OwnershipClaim | undefined
  ) {}

  static pathFor(ws: WorkspacePaths, area: SharedArea): string {
    return join(ws.ownershipDir, `${area}.json`);
  }

  /**
   * Load an area's index. A claim left pending by an interrupted merge is applied, since the merge
   * may have placed any of its paths already.
   */
  static async load(ws: WorkspacePaths, area: SharedArea, logger?: Logger): Promise<OwnershipIndex> {
    const path = OwnershipIndex.pathFor(ws, area);
    let raw: unknown;
    try {
      raw = await readJson(path);
    } catch (err) {
      if (isNotFound(err)) return new OwnershipIndex(path, new Map(), undefined);
      throw err;
    }

    const parsed = OwnershipFileSchema.parse(raw);
    const index = new OwnershipIndex(path, new Map(Object.entries(parsed.entries)), parsed.pending);
    if (index.pending) {
      logger?.warn(`Recovering interrupted ${area} merge for part '${index.pending.owner}'`);
      await index.commitClaim();
    }
    return index;
  }

  ownerOf(path: string): string | null {
    return this.entries.get(path)?.owner ?? null;
  }

  record(path: string): OwnershipRecord | undefined {
    return this.entries.get(path);
  }

  /** Recorded paths strictly below `path`, parents first. */
  below(path: string): Array<{ path: string; record: OwnershipRecord }> {
    const prefix = `${path}/`;
    const out: Array<{ path: string; record: OwnershipRecord }> = [];
    for (const [p, record] of this.entries) if (p.startsWith(prefix)) out.push({ path: p, record });
    return out.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }

  /** Record what actually sits at `path` after an earlier owner's copy was put back. */
  retype(path: string, kind: OwnedKind): void {
    const rec = this.entries.get(path);
    if (rec) this.entries.set(path, { ...rec, kind });
  }

  /** Paths `part` currently owns, sorted. */
  ownedBy(part: string): ClaimEntry[] {
    const out: ClaimEntry[] = [];
    for (const [path, rec] of this.entries) if (rec.owner === part) out.push({ path, kind: rec.kind });
    return out.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  }

  /** Persist the intent to merge `entries` for `owner` before the tree is touched. */
  async beginClaim(owner: string, entries: readonly ClaimEntry[]): Promise<void> {
    this.pending = { owner, entries: entries.map((e) => ({ path: e.path, kind: e.kind })) };
    await this.save();
  }

  async commitClaim(): Promise<void> {
    const claim = this.pending;
    if (!claim) return;
    for (const e of claim.entries) this.claim(claim.owner, e);
    this.pending = undefined;
    await this.save();
  }

  /**
   * Drop every claim `part` holds in this area. Paths it owned fall back to the most recent
   * earlier claimant; the returned list says what to restore or remove, deepest paths first.
   */
  release(part: string): Release[] {
    const out: Release[] = [];
    for (const [path, rec] of this.entries) {
      const wasOwner = rec.owner === part;
      if (!wasOwner && !rec.shadowed.includes(part)) continue;

      const shadowed = rec.shadowed.filter((p) => p !== part);
      if (!wasOwner) {
        this.entries.set(path, { ...rec, shadowed });
        continue;
      }

      const previous = shadowed.pop();
      if (previous === undefined) {
        this.entries.delete(path);
        out.push({ path, kind: rec.kind, restoreFrom: null, wasOwner, orphaned: true });
      } else {
        this.entries.set(path, { kind: rec.kind, owner: previous, shadowed });
        out.push({ path, kind: rec.kind, restoreFrom: previous, wasOwner, orphaned: false });
      }
    }
    return out.sort((a, b) => depth(b.path) - depth(a.path) || (a.path < b.path ? 1 : -1));
  }

  async save(): Promise<void> {
    const entries: Record<string, OwnershipRecord> = {};
    for (const path of [...this.entries.keys()].sort()) {
      const rec = this.entries.get(path);
      if (rec) entries[path] = rec;
    }
    await writeJsonAtomic(this.path, { version: OWNERSHIP_FORMAT_VERSION, entries, pending: this.pending });
  }

  private claim(owner: string, entry: ClaimEntry): void {
    const rec = this.entries.get(entry.path);
    if (!rec) {
      this.entries.set(entry.path, { kind: entry.kind, owner, shadowed: [] });
      return;
    }
    if (rec.owner === owner) {
      this.entries.set(entry.path, { ...rec, kind: entry.kind });
      return;
    }
    const shadowed = [...rec.shadowed.filter((p) => p !== owner), rec.owner];
    this.entries.set(entry.path, { kind: entry.kind, owner, shadowed });
  }
}

function depth(path: string): number {
  return path.split('/').length;
}
