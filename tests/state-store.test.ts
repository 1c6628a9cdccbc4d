import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { describe, expect, it } from 'vitest';

import { StateStore } from '../src/core/state/store.js';
import type { StepState } from '../src/core/state/types.js';
import { stateFilePath, workspacePaths } from '../src/workspace/layout.js';
import { collectingLogger, tempDir } from './helpers.js';

function record(overrides: Partial<StepState> = {}): StepState {
  return {
    version: 1,
    part: 'lib',
    step: 'build',
    fingerprint: 'f'.repeat(64),
    inputs: { properties: {}, options: {}, source: null, previous: 'p', dependencies: {} },
    files: [],
    directories: [],
    completedAt: '2026-02-07T10:00:00.000Z',
    ...overrides
  };
}

async function store() {
  const ws = workspacePaths(await tempDir('state'));
  const { logger, lines } = collectingLogger();
  return { ws, lines, store: new StateStore(ws, logger) };
}

async function writeRaw(path: string, content: string) {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, 'utf8');
}

describe('StateStore', () => {
  it('round-trips a record and reports absent records as null', async () => {
    const { store: s } = await store();
    expect(await s.get('lib', 'build')).toBeNull();
    await s.put(record({ files: ['bin/tool'] }));
    expect(await s.get('lib', 'build')).toEqual(record({ files: ['bin/tool'] }));
    expect(await s.recordedSteps('lib')).toEqual(['build']);
  });

  it('invalidates a record', async () => {
    const { store: s } = await store();
    await s.put(record());
    await s.invalidate('lib', 'build');
    expect(await s.get('lib', 'build')).toBeNull();
  });

  it('treats a truncated file as absent and warns', async () => {
    const { ws, lines, store: s } = await store();
    await writeRaw(stateFilePath(ws, 'lib', 'build'), '{"version": 1, "part": "li');
    expect(await s.get('lib', 'build')).toBeNull();
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('warn Unreadable state file');
  });

  it('treats an unknown format version as absent', async () => {
    const { ws, lines, store: s } = await store();
    await writeRaw(stateFilePath(ws, 'lib', 'build'), JSON.stringify({ ...record(), version: 7 }));
    const { state, warnings } = await s.readSafe('lib', 'build');
    expect(state).toBeNull();
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toContain('unknown state format version 7');
    expect(lines).toEqual([]);
  });

  it('treats a record filed under the wrong step as absent', async () => {
    const { ws, store: s } = await store();
    await writeRaw(stateFilePath(ws, 'lib', 'stage'), JSON.stringify(record()));
    const { state, warnings } = await s.readSafe('lib', 'stage');
    expect(state).toBeNull();
    expect(warnings[0]).toContain('record belongs to lib:build');
  });

  it('marks a record dirty once and keeps the first cause', async () => {
    const { store: s } = await store();
    expect(await s.markDirty('lib', 'build', { reason: 'forced', cause: 'first' })).toBe(false);

    await s.put(record());
    expect(await s.markDirty('lib', 'build', { reason: 'forced', cause: 'first' })).toBe(true);
    expect(await s.markDirty('lib', 'build', { reason: 'dependency-changed', cause: 'second' })).toBe(true);
    expect((await s.get('lib', 'build'))?.dirty).toEqual({ reason: 'forced', cause: 'first' });
  });
});
