import { describe, expect, it } from 'vitest';

import type { TreeEntry } from '../src/utils/tree.js';
import { ancestors, compileFileset, selectEntries } from '../src/workspace/filesets.js';

describe('compileFileset', () => {
  it('covers everything below a named directory', () => {
    const matches = compileFileset(['bin', '!bin/*.debug']);
    expect(matches('bin')).toBe(true);
    expect(matches('bin/tool')).toBe(true);
    expect(matches('bin/tool.debug')).toBe(false);
    expect(matches('lib/libx.so')).toBe(false);
  });

  it('includes everything else when only exclusions are given', () => {
    const matches = compileFileset(['!share/doc']);
    expect(matches('share/doc')).toBe(false);
    expect(matches('share/doc/README')).toBe(false);
    expect(matches('share/man/tool.1')).toBe(true);
    expect(matches('bin/tool')).toBe(true);
  });

  it('ignores leading and trailing slashes', () => {
    const matches = compileFileset(['/usr/lib/']);
    expect(matches('usr/lib/libx.so')).toBe(true);
    expect(matches('usr/share/x')).toBe(false);
  });

  it('matches dotfiles with the default fileset', () => {
    expect(compileFileset(['**'])('etc/.hidden')).toBe(true);
  });
});

describe('selectEntries', () => {
  const entries: TreeEntry[] = [
    { path: 'a', kind: 'dir' },
    { path: 'a/b', kind: 'dir' },
    { path: 'a/b/c.txt', kind: 'file' },
    { path: 'a/d.bin', kind: 'file' },
    { path: 'e.txt', kind: 'file' }
  ];

  it('keeps the parent directories of selected entries', () => {
    expect(selectEntries(entries, ['a/b/*.txt'])).toEqual([
      { path: 'a', kind: 'dir' },
      { path: 'a/b', kind: 'dir' },
      { path: 'a/b/c.txt', kind: 'file' }
    ]);
  });

  it('drops excluded entries and directories left without content', () => {
    expect(selectEntries(entries, ['!a/b'])).toEqual([
      { path: 'a', kind: 'dir' },
      { path: 'a/d.bin', kind: 'file' },
      { path: 'e.txt', kind: 'file' }
    ]);
  });
});

describe('ancestors', () => {
  it('lists parents outermost first', () => {
    expect(ancestors('a/b/c')).toEqual(['a', 'a/b']);
    expect(ancestors('top')).toEqual([]);
  });
});
