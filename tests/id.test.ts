import { describe, expect, it } from 'vitest';

import { RunIdGenerator, parseRunId } from '../src/utils/id.js';

describe('run id', () => {
  it('generates sortable ids with YYYYMMDD-NNN', () => {
    const gen = new RunIdGenerator();
    const id1 = gen.next(new Date('2026-02-07T00:00:00Z'));
    const id2 = gen.next(new Date('2026-02-07T00:00:01Z'));

    expect(id1).toBe('r-20260207-001');
    expect(parseRunId(id2)).toEqual({ yyyyMMdd: '20260207', nnn: '002' });
  });

  it('continues after the last recorded id of the same day', () => {
    const gen = new RunIdGenerator('r-20260207-041');
    expect(gen.next(new Date('2026-02-07T12:00:00Z'))).toBe('r-20260207-042');
  });

  it('restarts the sequence on a new day', () => {
    const gen = new RunIdGenerator('r-20260207-041');
    expect(gen.next(new Date('2026-02-08T00:00:00Z'))).toBe('r-20260208-001');
  });

  it('rejects malformed ids', () => {
    expect(parseRunId('j-20260207-001')).toBeNull();
    expect(parseRunId('r-2026027-001')).toBeNull();
  });
});
