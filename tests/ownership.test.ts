import { join } from 'node:path';
import { describe, expect, it } from 'vitest';

import { readJson, writeJson } from '../src/utils/fs.js';
import { initWorkspace } from '../src/workspace/layout.js';
import { OwnershipIndex } from '../src/workspace/ownership.js';
import { collectingLogger, tempDir } from './helpers.js';

async function workspace() {
  return await initWorkspace(join(await tempDir('ownership'), 'work'));
}

describe('OwnershipIndex', () => {
  it('persists committed claims', async () => {
    const ws = await workspace();
    const index = await OwnershipIndex.load(ws, 'stage');
    await index.beginClaim('a', [
      { path: 'bin', kind: 'dir' },
      { path: 'bin/a', kind: 'file' }
    ]);
    await index.commitClaim();

    const reloaded = await OwnershipIndex.load(ws, 'stage');
    expect(reloaded.ownedBy('a')).toEqual([
      { path: 'bin', kind: 'dir' },
      { path: 'bin/a', kind: 'file' }
    ]);
    expect(await readJson(OwnershipIndex.pathFor(ws, 'stage'))).toEqual({
      version: 1,
      entries: {
        bin: { kind: 'dir', owner: 'a', shadowed: [] },
        'bin/a': { kind: 'file', owner: 'a', shadowed: [] }
      }
    });
  });

  it('applies a claim left pending by an interrupted merge', async () => {
    const ws = await workspace();
    await writeJson(OwnershipIndex.pathFor(ws, 'prime'), {
      version: 1,
      entries: {},
      pending: { owner: 'a', entries: [{ path: 'x', kind: 'file' }] }
    });
    const { logger, lines } = collectingLogger();

    const index = await OwnershipIndex.load(ws, 'prime', logger);

    expect(index.ownerOf('x')).toBe('a');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain("Recovering interrupted prime merge for part 'a'");
    expect(await readJson(OwnershipIndex.pathFor(ws, 'prime'))).toEqual({
      version: 1,
      entries: { x: { kind: 'file', owner: 'a', shadowed: [] } }
    });
  });

  it('releases deepest paths first', async () => {
    const ws = await workspace();
    const index = await OwnershipIndex.load(ws, 'stage');
    await index.beginClaim('a', [
      { path: 'd', kind: 'dir' },
      { path: 'd/e', kind: 'dir' },
      { path: 'd/e/f', kind: 'file' },
      { path: 'g', kind: 'file' }
    ]);
    await index.commitClaim();

    expect(index.release('a').map((r) => r.path)).toEqual(['d/e/f', 'd/e', 'g', 'd']);
    expect(index.ownedBy('a')).toEqual([]);
  });

  it('hands paths back to the most recent earlier claimant', async () => {
    const ws = await workspace();
    const index = await OwnershipIndex.load(ws, 'stage');
    for (const owner of ['a', 'b', 'c']) {
      await index.beginClaim(owner, [{ path: 'x', kind: 'file' }]);
      await index.commitClaim();
    }
    expect(index.record('x')).toEqual({ kind: 'file', owner: 'c', shadowed: ['a', 'b'] });

    expect(index.release('b')).toEqual([]);
    expect(index.record('x')).toEqual({ kind: 'file', owner: 'c', shadowed: ['a'] });

    expect(index.release('c')).toEqual([{ path: 'x', kind: 'file', restoreFrom: 'a', wasOwner: true, orphaned: false }]);
    expect(index.release('a')).toEqual([{ path: 'x', kind: 'file', restoreFrom: null, wasOwner: true, orphaned: true }]);
    expect(index.record('x')).toBeUndefined();
  });
});
